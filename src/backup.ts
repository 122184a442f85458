import { errorMessage, RecoveryError } from "./errors.js";
import { KnowledgeSharingBus } from "./knowledge-bus.js";
import { silentLogger, type Logger } from "./logger.js";
import { findIntegrityIssues, MemoryStore } from "./memory-store.js";
import { RecurringTask } from "./recurring-task.js";
import { createSnapshot, deserializeSnapshot, serializeSnapshot } from "./snapshot.js";
import type { Clock, RecoveryReport, RetentionPolicy, Snapshot, SnapshotStorage } from "./types.js";

export interface BackupConfig {
  intervalMs: number;
  retention?: RetentionPolicy;
}

export interface BackupDeps {
  store: MemoryStore;
  bus: KnowledgeSharingBus;
  storage: SnapshotStorage;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Full snapshots of the store and the bus subscription table, plus
 * all-or-nothing recovery. Snapshot and recover requests share one queue,
 * so at most one of them is in flight at any time.
 */
export class BackupRecoveryCoordinator {
  private readonly store: MemoryStore;
  private readonly bus: KnowledgeSharingBus;
  private readonly storage: SnapshotStorage;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly retention: RetentionPolicy;
  private readonly task: RecurringTask;
  private nextSequence: number | null = null;
  private tail: Promise<unknown> = Promise.resolve();
  private latest: Snapshot | null = null;

  constructor(config: BackupConfig, deps: BackupDeps) {
    this.store = deps.store;
    this.bus = deps.bus;
    this.storage = deps.storage;
    this.clock = deps.clock ?? Date.now;
    this.logger = deps.logger ?? silentLogger;
    this.retention = config.retention ?? {};
    this.task = new RecurringTask("snapshot", config.intervalMs, () => this.snapshot(), this.logger);
  }

  get lastSnapshot(): Snapshot | null {
    return this.latest;
  }

  start(): void {
    this.task.start();
  }

  stop(): Promise<void> {
    return this.task.stop();
  }

  snapshot(): Promise<Snapshot> {
    return this.enqueue(() => this.takeSnapshot());
  }

  recover(snapshot: Snapshot): Promise<RecoveryReport> {
    return this.enqueue(() => this.restore(snapshot, snapshot.items.length));
  }

  /** Read and validate a stored snapshot without applying it. */
  async load(sequence: number): Promise<Snapshot> {
    return (await this.loadWithCount(sequence)).snapshot;
  }

  recoverFrom(sequence: number): Promise<RecoveryReport> {
    return this.enqueue(async () => {
      const { snapshot, declaredItemCount } = await this.loadWithCount(sequence);
      return this.restore(snapshot, declaredItemCount);
    });
  }

  async recoverLatest(): Promise<RecoveryReport> {
    const entries = await this.storage.list();
    const newest = entries[entries.length - 1];
    if (!newest) throw new RecoveryError("No snapshots available");
    return this.recoverFrom(newest.sequence);
  }

  /**
   * Drops superseded snapshots past the count or age limit, oldest first.
   * The most recent one is always kept. Returns the removed sequences.
   */
  async applyRetention(now: number = this.clock()): Promise<number[]> {
    const entries = await this.storage.list();
    const removable = entries.slice(0, -1);
    const { maxSnapshots, maxAgeMs } = this.retention;
    const overCount = maxSnapshots === undefined ? 0 : Math.max(0, entries.length - maxSnapshots);

    const removed: number[] = [];
    for (const [index, entry] of removable.entries()) {
      const tooOld = maxAgeMs !== undefined && now - Date.parse(entry.createdAt) > maxAgeMs;
      if (index < overCount || tooOld) {
        await this.storage.remove(entry.sequence);
        removed.push(entry.sequence);
      }
    }
    if (removed.length > 0) {
      this.logger.debug(`retention removed snapshot(s) ${removed.join(", ")}`);
    }
    return removed;
  }

  private enqueue<T>(job: () => Promise<T>): Promise<T> {
    const run = this.tail.then(job);
    this.tail = run.catch(() => undefined);
    return run;
  }

  private async takeSnapshot(): Promise<Snapshot> {
    const sequence = await this.reserveSequence();
    const takenAt = new Date(this.clock()).toISOString();
    const snapshot = createSnapshot(sequence, takenAt, this.store.exportItems(), this.bus.subscriptionTable());

    await this.storage.write(sequence, serializeSnapshot(snapshot), takenAt);
    this.latest = snapshot;
    this.logger.info(`snapshot ${sequence} written (${snapshot.items.length} items)`);

    try {
      await this.applyRetention();
    } catch (error) {
      this.logger.warn(`snapshot retention failed: ${errorMessage(error)}`);
    }
    return snapshot;
  }

  private async reserveSequence(): Promise<number> {
    if (this.nextSequence === null) {
      const entries = await this.storage.list();
      const highest = entries.reduce((max, e) => Math.max(max, e.sequence), 0);
      this.nextSequence = highest + 1;
    }
    return this.nextSequence++;
  }

  private async loadWithCount(sequence: number): Promise<{ snapshot: Snapshot; declaredItemCount: number }> {
    const blob = await this.storage.read(sequence);
    if (blob === null) throw new RecoveryError(`Snapshot ${sequence} not found`);
    const loaded = deserializeSnapshot(blob);
    if (loaded.snapshot.sequence !== sequence) {
      throw new RecoveryError(`Snapshot stored under ${sequence} claims sequence ${loaded.snapshot.sequence}`);
    }
    return loaded;
  }

  private async restore(snapshot: Snapshot, expectedCount: number): Promise<RecoveryReport> {
    const staged = findIntegrityIssues(snapshot.items);
    if (snapshot.items.length !== expectedCount) {
      staged.push(`snapshot declares ${expectedCount} items but holds ${snapshot.items.length}`);
    }
    if (staged.length > 0) {
      this.logger.error(`recovery of snapshot ${snapshot.sequence} rejected`);
      throw new RecoveryError(`Snapshot ${snapshot.sequence} failed verification`, staged);
    }

    const priorItems = this.store.exportItems();
    const priorSubscriptions = this.bus.subscriptionTable();

    this.store.replaceAll(snapshot.items);
    const rebound = this.bus.restoreSubscriptions(snapshot.subscriptions);

    const live = this.store.exportItems();
    const issues = findIntegrityIssues(live);
    if (live.length !== snapshot.items.length) {
      issues.push(`restored store holds ${live.length} items, snapshot has ${snapshot.items.length}`);
    }
    if (issues.length > 0) {
      this.store.replaceAll(priorItems);
      this.bus.restoreSubscriptions(priorSubscriptions);
      throw new RecoveryError(`Restored state from snapshot ${snapshot.sequence} failed verification`, issues);
    }

    if (this.nextSequence !== null && this.nextSequence <= snapshot.sequence) {
      this.nextSequence = snapshot.sequence + 1;
    }

    const report: RecoveryReport = {
      sequence: snapshot.sequence,
      itemsRestored: live.length,
      tiers: this.store.counts(),
      subscriptionsRestored: rebound.restored,
      unresolvedSubscribers: rebound.unresolved,
      recoveredAt: new Date(this.clock()).toISOString(),
    };
    this.logger.info(`recovered snapshot ${snapshot.sequence} (${report.itemsRestored} items)`);
    return report;
  }
}
