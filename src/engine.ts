import { BackupRecoveryCoordinator } from "./backup.js";
import { parseConfig, type EngineConfig, type EngineConfigInput } from "./config.js";
import { ConsolidationScheduler } from "./consolidation.js";
import { InvalidInputError, NotFoundError } from "./errors.js";
import { FeedbackController } from "./feedback.js";
import { FitnessEngine } from "./fitness.js";
import type { LlmImportanceAssessor } from "./importance.js";
import { KnowledgeSharingBus, TOPICS } from "./knowledge-bus.js";
import { createLogger, type Logger, type LogLevel } from "./logger.js";
import { MemoryStore } from "./memory-store.js";
import type { AdmitOptions, Clock, DeliveryReport, SimilarityComparator, SnapshotStorage } from "./types.js";

export interface MemoryEngineDeps {
  storage: SnapshotStorage;
  similarity?: SimilarityComparator;
  assessor?: LlmImportanceAssessor;
  clock?: Clock;
  /** Builds a logger per component; defaults to console loggers at `logLevel`. */
  loggerFactory?: (scope: string) => Logger;
  logLevel?: LogLevel;
}

/**
 * Wires the store, fitness function, bus, consolidation, backup and
 * feedback loops from one validated configuration value.
 */
export class MemoryEngine {
  readonly config: EngineConfig;
  readonly fitness: FitnessEngine;
  readonly store: MemoryStore;
  readonly bus: KnowledgeSharingBus;
  readonly consolidation: ConsolidationScheduler;
  readonly backup: BackupRecoveryCoordinator;
  readonly feedback: FeedbackController;
  private readonly assessor?: LlmImportanceAssessor;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private started = false;

  constructor(config: EngineConfigInput, deps: MemoryEngineDeps) {
    this.config = parseConfig(config);
    const clock = deps.clock ?? Date.now;
    this.clock = clock;
    const level = deps.logLevel ?? "info";
    const loggerFor = deps.loggerFactory ?? ((scope: string) => createLogger(scope, level));
    this.logger = loggerFor("engine");
    this.assessor = deps.assessor;

    this.fitness = new FitnessEngine(this.config.fitness);
    this.store = new MemoryStore(
      { stmCapacity: this.config.stmCapacity, connectionThreshold: this.config.connectionThreshold },
      { fitness: this.fitness, similarity: deps.similarity, clock, logger: loggerFor("store") },
    );
    this.bus = new KnowledgeSharingBus({
      fitness: this.fitness,
      clock,
      logger: loggerFor("bus"),
      historySize: this.config.bus.historySize,
    });
    this.consolidation = new ConsolidationScheduler(
      {
        ltmThreshold: this.config.ltmThreshold,
        pruneThreshold: this.config.pruneThreshold,
        intervalMs: this.config.consolidationIntervalMs,
        maxPromotionsPerCycle: this.config.maxPromotionsPerCycle,
      },
      { store: this.store, bus: this.bus, clock, logger: loggerFor("consolidation") },
    );
    this.backup = new BackupRecoveryCoordinator(
      {
        intervalMs: this.config.backup.snapshotIntervalMs,
        retention: { maxSnapshots: this.config.backup.maxSnapshots, maxAgeMs: this.config.backup.maxAgeMs },
      },
      { store: this.store, bus: this.bus, storage: deps.storage, clock, logger: loggerFor("backup") },
    );
    this.feedback = new FeedbackController(this.config.feedback, {
      fitness: this.fitness,
      clock,
      logger: loggerFor("feedback"),
    });
    this.bus.subscribe(TOPICS.feedback, this.feedback.subscriber());
  }

  now(): number {
    return this.clock();
  }

  get running(): boolean {
    return this.started;
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.consolidation.start();
    this.backup.start();
    this.feedback.start();
    this.logger.info("engine started");
  }

  /** Lets in-flight cycles finish their current step before returning. */
  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    await Promise.all([this.consolidation.stop(), this.backup.stop(), this.feedback.stop()]);
    this.logger.info("engine stopped");
  }

  admit(content: string, options?: AdmitOptions): string {
    return this.store.admit(content, options);
  }

  /**
   * Admit with an LLM-assessed importance. A CompletionError propagates to
   * the caller; nothing is admitted in that case.
   */
  async admitAssessed(content: string, options: Omit<AdmitOptions, "importance"> = {}): Promise<string> {
    if (content.trim() === "") {
      throw new InvalidInputError("Memory content must be a non-empty string");
    }
    if (!this.assessor) {
      return this.store.admit(content, options);
    }
    const importance = await this.assessor.assess(content);
    return this.store.admit(content, { ...options, importance });
  }

  /** An agent shares one of its live memories with every subscriber of `topic`. */
  share(id: string, sourceAgent: string, topic: string = TOPICS.shared): DeliveryReport {
    if (sourceAgent.trim() === "" || topic.trim() === "") {
      throw new InvalidInputError("sourceAgent and topic must be non-empty");
    }
    const item = this.store.get(id);
    if (!item || item.tier === "archived") throw new NotFoundError(id);
    this.logger.debug(`${sourceAgent} shared ${id} on "${topic}"`);
    return this.bus.publish(topic, item, sourceAgent);
  }
}
