export type MemoryEngineErrorCode =
  | "INVALID_INPUT"
  | "NOT_FOUND"
  | "COMPLETION_FAILED"
  | "RECOVERY_FAILED"
  | "SUBSCRIBER_FAILED";

export class MemoryEngineError extends Error {
  readonly code: MemoryEngineErrorCode;

  constructor(code: MemoryEngineErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed arguments. The caller's fault; never retried. */
export class InvalidInputError extends MemoryEngineError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
  }
}

/** Unknown id, or an id whose item is archived. */
export class NotFoundError extends MemoryEngineError {
  readonly id: string;

  constructor(id: string, message = `Memory ${id} not found`) {
    super("NOT_FOUND", message);
    this.id = id;
  }
}

/** The external LLM call timed out, answered non-2xx, or returned nothing usable. */
export class CompletionError extends MemoryEngineError {
  readonly status?: number;

  constructor(message: string, options?: ErrorOptions & { status?: number }) {
    super("COMPLETION_FAILED", message, options);
    this.status = options?.status;
  }
}

/** Restore verification failed; engine state was left as it was. */
export class RecoveryError extends MemoryEngineError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
    super("RECOVERY_FAILED", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, options);
    this.issues = issues;
  }
}

/** A bus handler threw. Logged and counted, never propagated to the publisher. */
export class SubscriberError extends MemoryEngineError {
  readonly topic: string;
  readonly subscriberId: string;

  constructor(topic: string, subscriberId: string, cause: unknown) {
    const msg = cause instanceof Error ? cause.message : String(cause);
    super("SUBSCRIBER_FAILED", `Subscriber ${subscriberId} failed on "${topic}": ${msg}`, { cause });
    this.topic = topic;
    this.subscriberId = subscriberId;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
