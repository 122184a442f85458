/** Memory tiers, in the only order an item may move through them. */
export const MEMORY_TIERS = ["stm", "ltm", "archived"] as const;
export type MemoryTier = (typeof MEMORY_TIERS)[number];

/** Signals combined by the fitness function. */
export const FITNESS_DIMENSIONS = ["recency", "frequency", "importance"] as const;
export type FitnessDimension = (typeof FITNESS_DIMENSIONS)[number];

/**
 * By-value view of a remembered item. Callers never get a live reference:
 * every field is copied out of the store.
 */
export interface MemoryItem {
  readonly id: string;
  readonly content: string;
  readonly embedding?: Uint8Array;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly createdAt: string;
  readonly lastAccessedAt: string;
  readonly accessCount: number;
  readonly importance: number;
  readonly connections: readonly string[];
  readonly tier: MemoryTier;
  readonly archivedAt?: string;
}

export interface AdmitOptions {
  embedding?: Uint8Array;
  /** 0–1, defaults to 0.5. */
  importance?: number;
  metadata?: Record<string, unknown>;
  /** Existing, non-archived ids to link the new item to. */
  connections?: string[];
}

export interface ScoredItem {
  id: string;
  score: number;
}

/** Result of a promote/archive request; a no-op is reported, not thrown. */
export type TransitionOutcome =
  | { changed: true; id: string; from: MemoryTier; to: MemoryTier }
  | { changed: false; id: string; tier: MemoryTier; reason: "already-ltm" | "already-archived" | "archived" };

export type FitnessWeights = Readonly<Record<FitnessDimension, number>>;

export interface FitnessBreakdown {
  recency: number;
  frequency: number;
  importance: number;
  score: number;
}

/** Compares two embedding blobs; higher means more alike. */
export type SimilarityComparator = (a: Uint8Array, b: Uint8Array) => number;

/** Epoch milliseconds. */
export type Clock = () => number;

// ── bus ─────────────────────────────────────────────────────────────────────

export interface EnrichmentMetadata {
  publishedAt: string;
  confidence: number;
  relationships: string[];
  /** Agent that shared the item; absent for engine-driven publishes. */
  sourceAgent?: string;
}

export interface MemoryMessage {
  kind: "memory";
  topic: string;
  item: MemoryItem;
  metadata: EnrichmentMetadata;
}

export interface ConsolidationMessage {
  kind: "consolidation";
  topic: string;
  publishedAt: string;
  result: ConsolidationResult;
}

export interface FeedbackMessage {
  kind: "feedback";
  topic: string;
  publishedAt: string;
  sourceAgent: string;
  targetAgent: string;
  feedback: Feedback;
}

export type BusMessage = MemoryMessage | ConsolidationMessage | FeedbackMessage;

/** Payload for `broadcast`: everything but the fields the bus stamps itself. */
export type BroadcastPayload =
  | Omit<ConsolidationMessage, "topic" | "publishedAt">
  | Omit<FeedbackMessage, "topic" | "publishedAt">;

export interface Subscriber {
  /** Stable identity; also what snapshots record. */
  readonly id: string;
  handle(message: BusMessage): void | Promise<void>;
}

/** `delivered` counts handlers that accepted the message without throwing. */
export interface DeliveryReport {
  topic: string;
  delivered: number;
  failed: number;
}

/** topic → subscriber ids, in subscription order. */
export type SubscriptionTable = Record<string, string[]>;

// ── consolidation ───────────────────────────────────────────────────────────

export interface ConsolidationError {
  id: string;
  step: "promote" | "evict" | "prune" | "publish";
  message: string;
}

export interface ConsolidationResult {
  startedAt: string;
  finishedAt: string;
  promoted: string[];
  evicted: string[];
  pruned: string[];
  /** evicted + pruned */
  archived: string[];
  promotedCount: number;
  archivedCount: number;
  errors: ConsolidationError[];
  aborted: boolean;
}

// ── feedback ────────────────────────────────────────────────────────────────

export interface Feedback {
  dimension: FitnessDimension;
  /** -1 (weaken) … 1 (reinforce) */
  rating: number;
  itemId?: string;
  note?: string;
}

export interface FeedbackRecord {
  readonly sourceAgent: string;
  readonly targetAgent: string;
  readonly feedback: Readonly<Feedback>;
  readonly recordedAt: string;
}

// ── backup ──────────────────────────────────────────────────────────────────

export interface Snapshot {
  readonly sequence: number;
  readonly takenAt: string;
  readonly items: readonly MemoryItem[];
  readonly subscriptions: Readonly<SubscriptionTable>;
}

export interface SnapshotEntry {
  sequence: number;
  createdAt: string;
}

/** Durable key-value medium for serialized snapshots. */
export interface SnapshotStorage {
  /** `takenAt` defaults to the time of the write; retention ages entries by it. */
  write(sequence: number, blob: string, takenAt?: string): Promise<void>;
  read(sequence: number): Promise<string | null>;
  /** Oldest first. */
  list(): Promise<SnapshotEntry[]>;
  remove(sequence: number): Promise<void>;
}

export interface RecoveryReport {
  sequence: number;
  itemsRestored: number;
  tiers: Record<MemoryTier, number>;
  subscriptionsRestored: number;
  unresolvedSubscribers: string[];
  recoveredAt: string;
}

export interface RetentionPolicy {
  maxSnapshots?: number;
  maxAgeMs?: number;
}
