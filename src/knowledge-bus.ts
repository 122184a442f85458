import { SubscriberError } from "./errors.js";
import { FitnessEngine } from "./fitness.js";
import { silentLogger, type Logger } from "./logger.js";
import type {
  BroadcastPayload,
  BusMessage,
  Clock,
  DeliveryReport,
  MemoryItem,
  MemoryMessage,
  Subscriber,
  SubscriptionTable,
} from "./types.js";

export const TOPICS = {
  consolidation: "consolidation",
  promoted: "memory.promoted",
  feedback: "feedback",
  shared: "knowledge.shared",
} as const;

export interface KnowledgeBusOptions {
  fitness?: FitnessEngine;
  clock?: Clock;
  logger?: Logger;
  /** Enriched items kept per topic for `recent()`. 0 disables. */
  historySize?: number;
}

export interface RestoreResult {
  restored: number;
  unresolved: string[];
}

/**
 * In-process topic broadcast. Delivery runs synchronously inside the
 * publisher's call, handler by handler in subscription order. A handler that
 * throws is isolated and counted; a promise a handler returns is not waited
 * for, and its rejection is logged. Nothing is queued: subscribers added
 * after a publish never see it.
 */
export class KnowledgeSharingBus {
  private subscriptions = new Map<string, Subscriber[]>();
  /** Every subscriber ever registered, so a restored table can be re-bound. */
  private readonly known = new Map<string, Subscriber>();
  private readonly history = new Map<string, MemoryMessage[]>();
  private readonly fitness: FitnessEngine;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly historySize: number;

  constructor(options: KnowledgeBusOptions = {}) {
    this.fitness = options.fitness ?? new FitnessEngine();
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? silentLogger;
    this.historySize = options.historySize ?? 50;
  }

  /** Idempotent per (topic, subscriber id). Returns an unsubscribe function. */
  subscribe(topic: string, subscriber: Subscriber): () => boolean {
    const list = this.subscriptions.get(topic) ?? [];
    if (!list.some((s) => s.id === subscriber.id)) {
      list.push(subscriber);
      this.subscriptions.set(topic, list);
      this.known.set(subscriber.id, subscriber);
    }
    return () => this.unsubscribe(topic, subscriber.id);
  }

  unsubscribe(topic: string, subscriberId: string): boolean {
    const list = this.subscriptions.get(topic);
    if (!list) return false;
    const index = list.findIndex((s) => s.id === subscriberId);
    if (index === -1) return false;
    list.splice(index, 1);
    if (list.length === 0) this.subscriptions.delete(topic);
    return true;
  }

  topics(): string[] {
    return [...this.subscriptions.keys()];
  }

  subscriberCount(topic: string): number {
    return this.subscriptions.get(topic)?.length ?? 0;
  }

  /**
   * Enrich an item with publish time, confidence and relationships, then fan
   * out. `sourceAgent` names the agent sharing it, when there is one.
   */
  publish(topic: string, item: MemoryItem, sourceAgent?: string): DeliveryReport {
    const now = this.clock();
    const message: MemoryMessage = {
      kind: "memory",
      topic,
      item,
      metadata: {
        publishedAt: new Date(now).toISOString(),
        confidence: this.fitness.score(item, now),
        relationships: [...item.connections],
        ...(sourceAgent ? { sourceAgent } : {}),
      },
    };
    this.remember(topic, message);
    return this.deliver(topic, message);
  }

  /** Fan out a non-item message such as a consolidation result or feedback. */
  broadcast(topic: string, payload: BroadcastPayload): DeliveryReport {
    const message: BusMessage = { ...payload, topic, publishedAt: new Date(this.clock()).toISOString() };
    return this.deliver(topic, message);
  }

  /** Most recent enriched items on a topic, oldest first. */
  recent(topic: string): MemoryMessage[] {
    return [...(this.history.get(topic) ?? [])];
  }

  subscriptionTable(): SubscriptionTable {
    const table: SubscriptionTable = {};
    for (const [topic, list] of this.subscriptions) {
      table[topic] = list.map((s) => s.id);
    }
    return table;
  }

  /**
   * Replace the subscription table, binding ids to subscribers this bus has
   * seen. Ids with no known handler are dropped and reported.
   */
  restoreSubscriptions(table: Readonly<SubscriptionTable>): RestoreResult {
    const next = new Map<string, Subscriber[]>();
    const unresolved = new Set<string>();
    let restored = 0;

    for (const [topic, ids] of Object.entries(table)) {
      const list: Subscriber[] = [];
      for (const id of ids) {
        const subscriber = this.known.get(id);
        if (!subscriber) {
          unresolved.add(id);
        } else if (!list.includes(subscriber)) {
          list.push(subscriber);
          restored++;
        }
      }
      if (list.length > 0) next.set(topic, list);
    }

    this.subscriptions = next;
    if (unresolved.size > 0) {
      this.logger.warn(`no handler registered for subscriber(s): ${[...unresolved].join(", ")}`);
    }
    return { restored, unresolved: [...unresolved] };
  }

  private deliver(topic: string, message: BusMessage): DeliveryReport {
    // Copy: handlers may (un)subscribe while we iterate.
    const targets = [...(this.subscriptions.get(topic) ?? [])];
    let delivered = 0;
    let failed = 0;

    for (const subscriber of targets) {
      try {
        const pending = subscriber.handle(message);
        if (pending instanceof Promise) {
          pending.catch((error: unknown) => this.reportFailure(topic, subscriber.id, error));
        }
        delivered++;
      } catch (error) {
        failed++;
        this.reportFailure(topic, subscriber.id, error);
      }
    }

    return { topic, delivered, failed };
  }

  private reportFailure(topic: string, subscriberId: string, error: unknown): void {
    const wrapped = new SubscriberError(topic, subscriberId, error);
    this.logger.warn(wrapped.message);
  }

  private remember(topic: string, message: MemoryMessage): void {
    if (this.historySize === 0) return;
    const list = this.history.get(topic) ?? [];
    list.push(message);
    if (list.length > this.historySize) list.splice(0, list.length - this.historySize);
    this.history.set(topic, list);
  }
}
