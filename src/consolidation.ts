import { errorMessage, InvalidInputError } from "./errors.js";
import { KnowledgeSharingBus, TOPICS } from "./knowledge-bus.js";
import { silentLogger, type Logger } from "./logger.js";
import { MemoryStore } from "./memory-store.js";
import { RecurringTask } from "./recurring-task.js";
import type { Clock, ConsolidationError, ConsolidationResult } from "./types.js";

export interface ConsolidationConfig {
  ltmThreshold: number;
  /** Must sit strictly below ltmThreshold so nothing qualifies for both. */
  pruneThreshold: number;
  intervalMs: number;
  maxPromotionsPerCycle?: number;
}

export interface ConsolidationDeps {
  store: MemoryStore;
  bus: KnowledgeSharingBus;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Periodic pass over both tiers: promote strong STM items, enforce the STM
 * ceiling, prune weak LTM items, announce the outcome.
 */
export class ConsolidationScheduler {
  private readonly config: ConsolidationConfig;
  private readonly store: MemoryStore;
  private readonly bus: KnowledgeSharingBus;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly task: RecurringTask;
  private last: ConsolidationResult | null = null;

  constructor(config: ConsolidationConfig, deps: ConsolidationDeps) {
    if (!(config.pruneThreshold < config.ltmThreshold)) {
      throw new InvalidInputError(
        `pruneThreshold (${config.pruneThreshold}) must be strictly less than ltmThreshold (${config.ltmThreshold})`,
      );
    }
    this.config = config;
    this.store = deps.store;
    this.bus = deps.bus;
    this.clock = deps.clock ?? Date.now;
    this.logger = deps.logger ?? silentLogger;
    this.task = new RecurringTask("consolidation", config.intervalMs, (signal) => this.runCycle(undefined, signal), this.logger);
  }

  get lastResult(): ConsolidationResult | null {
    return this.last;
  }

  start(): void {
    this.task.start();
  }

  /** Lets an in-flight cycle finish the item it is on, then returns. */
  stop(): Promise<void> {
    return this.task.stop();
  }

  async runCycle(now: number = this.clock(), signal?: AbortSignal): Promise<ConsolidationResult> {
    const startedAt = new Date(this.clock()).toISOString();
    const promoted: string[] = [];
    const evicted: string[] = [];
    const pruned: string[] = [];
    const errors: ConsolidationError[] = [];
    let aborted = false;

    const step = (id: string, kind: ConsolidationError["step"], fn: () => boolean): void => {
      try {
        if (fn()) {
          if (kind === "promote") promoted.push(id);
          else if (kind === "evict") evicted.push(id);
          else pruned.push(id);
        }
      } catch (error) {
        this.logger.warn(`${kind} ${id} failed: ${errorMessage(error)}`);
        errors.push({ id, step: kind, message: errorMessage(error) });
      }
    };

    const stmRanking = this.store.evaluateStm(now);
    const cap = this.config.maxPromotionsPerCycle ?? Infinity;
    for (const { id, score } of stmRanking) {
      if (signal?.aborted) {
        aborted = true;
        break;
      }
      if (score < this.config.ltmThreshold || promoted.length >= cap) break;
      step(id, "promote", () => this.store.promote(id).changed);
    }

    if (!aborted && this.store.counts().stm > this.store.stmCapacity) {
      const promotedSet = new Set(promoted);
      const weakest = [...stmRanking].reverse().find((entry) => !promotedSet.has(entry.id));
      if (weakest) step(weakest.id, "evict", () => this.store.archive(weakest.id, "evicted").changed);
    }

    if (!aborted) {
      for (const { id, score } of this.store.evaluateLtm(now)) {
        if (signal?.aborted) {
          aborted = true;
          break;
        }
        if (score < this.config.pruneThreshold) {
          step(id, "prune", () => this.store.archive(id, "pruned").changed);
        }
      }
    }

    for (const id of promoted) {
      const item = this.store.get(id);
      if (!item || item.tier !== "ltm") continue;
      try {
        this.bus.publish(TOPICS.promoted, item);
      } catch (error) {
        errors.push({ id, step: "publish", message: errorMessage(error) });
      }
    }

    const archived = [...evicted, ...pruned];
    const result: ConsolidationResult = {
      startedAt,
      finishedAt: new Date(this.clock()).toISOString(),
      promoted,
      evicted,
      pruned,
      archived,
      promotedCount: promoted.length,
      archivedCount: archived.length,
      errors,
      aborted,
    };
    this.last = result;

    this.logger.info(
      `cycle done: ${promoted.length} promoted, ${archived.length} archived, ${errors.length} error(s)${aborted ? " (aborted)" : ""}`,
    );
    this.bus.broadcast(TOPICS.consolidation, { kind: "consolidation", result });
    return result;
  }
}
