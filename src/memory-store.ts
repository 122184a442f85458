import { randomUUID } from "crypto";
import { InvalidInputError, NotFoundError } from "./errors.js";
import { FitnessEngine } from "./fitness.js";
import { silentLogger, type Logger } from "./logger.js";
import type {
  AdmitOptions,
  Clock,
  MemoryItem,
  MemoryTier,
  ScoredItem,
  SimilarityComparator,
  TransitionOutcome,
} from "./types.js";

export interface MemoryStoreConfig {
  /** Hard ceiling on STM items. */
  stmCapacity: number;
  /** Minimum comparator score for an automatic connection on admit. */
  connectionThreshold?: number;
}

export interface MemoryStoreDeps {
  fitness?: FitnessEngine;
  similarity?: SimilarityComparator;
  clock?: Clock;
  logger?: Logger;
}

/** Internal, mutable form. Never handed out. */
interface MemoryRecord {
  id: string;
  content: string;
  embedding?: Uint8Array;
  metadata: Record<string, unknown>;
  createdAt: string;
  lastAccessedAt: string;
  accessCount: number;
  importance: number;
  connections: Set<string>;
  tier: MemoryTier;
  archivedAt?: string;
}

export type ArchiveReason = "evicted" | "pruned" | "manual";

function copyItem(record: MemoryRecord): MemoryItem {
  return {
    id: record.id,
    content: record.content,
    ...(record.embedding ? { embedding: record.embedding.slice() } : {}),
    metadata: { ...record.metadata },
    createdAt: record.createdAt,
    lastAccessedAt: record.lastAccessedAt,
    accessCount: record.accessCount,
    importance: record.importance,
    connections: [...record.connections],
    tier: record.tier,
    ...(record.archivedAt ? { archivedAt: record.archivedAt } : {}),
  };
}

function toRecord(item: MemoryItem): MemoryRecord {
  return {
    id: item.id,
    content: item.content,
    ...(item.embedding ? { embedding: item.embedding.slice() } : {}),
    metadata: { ...item.metadata },
    createdAt: item.createdAt,
    lastAccessedAt: item.lastAccessedAt,
    accessCount: item.accessCount,
    importance: item.importance,
    connections: new Set(item.connections),
    tier: item.tier,
    ...(item.archivedAt ? { archivedAt: item.archivedAt } : {}),
  };
}

/**
 * Checks an item set for the structural invariants a live store maintains.
 * Returns one message per violation; an empty list means the set is sound.
 */
export function findIntegrityIssues(items: readonly MemoryItem[]): string[] {
  const issues: string[] = [];
  const byId = new Map<string, MemoryItem>();

  for (const item of items) {
    const seen = byId.get(item.id);
    if (seen) {
      issues.push(`item ${item.id} appears in more than one tier (${seen.tier}, ${item.tier})`);
      continue;
    }
    byId.set(item.id, item);
  }

  for (const item of byId.values()) {
    if (Date.parse(item.lastAccessedAt) < Date.parse(item.createdAt)) {
      issues.push(`item ${item.id} was last accessed before it was created`);
    }
    if (!Number.isInteger(item.accessCount) || item.accessCount < 1) {
      issues.push(`item ${item.id} has invalid access count ${item.accessCount}`);
    }
    if (!(item.importance >= 0 && item.importance <= 1)) {
      issues.push(`item ${item.id} has importance ${item.importance} outside [0,1]`);
    }
    for (const other of item.connections) {
      const target = byId.get(other);
      if (!target) {
        issues.push(`item ${item.id} references missing connection ${other}`);
      } else if (other === item.id) {
        issues.push(`item ${item.id} is connected to itself`);
      } else if (item.tier === "archived" || target.tier === "archived") {
        issues.push(`archived item in connection ${item.id} <-> ${other}`);
      } else if (!target.connections.includes(item.id)) {
        issues.push(`connection ${item.id} -> ${other} has no back-reference`);
      }
    }
  }

  return issues;
}

/**
 * Owns every MemoryItem. All mutation passes through admit, touch, connect,
 * promote, archive and replaceAll; each runs to completion without awaiting,
 * so on Node's single thread each call is its own critical section.
 */
export class MemoryStore {
  private items = new Map<string, MemoryRecord>();
  private readonly capacity: number;
  private readonly connectionThreshold: number;
  private readonly fitness: FitnessEngine;
  private readonly similarity?: SimilarityComparator;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(config: MemoryStoreConfig, deps: MemoryStoreDeps = {}) {
    if (!Number.isInteger(config.stmCapacity) || config.stmCapacity < 1) {
      throw new InvalidInputError(`stmCapacity must be a positive integer, got ${config.stmCapacity}`);
    }
    this.capacity = config.stmCapacity;
    this.connectionThreshold = config.connectionThreshold ?? 0.85;
    this.fitness = deps.fitness ?? new FitnessEngine();
    this.similarity = deps.similarity;
    this.clock = deps.clock ?? Date.now;
    this.logger = deps.logger ?? silentLogger;
  }

  get stmCapacity(): number {
    return this.capacity;
  }

  /** Non-archived items. */
  get size(): number {
    let n = 0;
    for (const record of this.items.values()) {
      if (record.tier !== "archived") n++;
    }
    return n;
  }

  counts(): Record<MemoryTier, number> {
    const counts: Record<MemoryTier, number> = { stm: 0, ltm: 0, archived: 0 };
    for (const record of this.items.values()) counts[record.tier]++;
    return counts;
  }

  /**
   * Add content to short-term memory. When STM is full the lowest-fitness
   * STM item is archived first, so admission never fails for capacity.
   */
  admit(content: string, options: AdmitOptions = {}): string {
    if (typeof content !== "string" || content.trim() === "") {
      throw new InvalidInputError("Memory content must be a non-empty string");
    }
    const importance = options.importance ?? 0.5;
    if (!Number.isFinite(importance) || importance < 0 || importance > 1) {
      throw new InvalidInputError(`importance must be within [0,1], got ${importance}`);
    }
    const requested = new Set(options.connections ?? []);
    for (const id of requested) this.requireLive(id);

    const now = this.clock();
    if (this.counts().stm >= this.capacity) {
      this.evictForAdmission(now, requested);
    }

    const nowIso = new Date(now).toISOString();
    const record: MemoryRecord = {
      id: randomUUID(),
      content,
      ...(options.embedding ? { embedding: options.embedding.slice() } : {}),
      metadata: { ...(options.metadata ?? {}) },
      createdAt: nowIso,
      lastAccessedAt: nowIso,
      accessCount: 1,
      importance,
      connections: new Set(),
      tier: "stm",
    };
    this.items.set(record.id, record);

    for (const id of requested) {
      const target = this.items.get(id);
      if (target && target.tier !== "archived") this.link(record, target);
    }
    this.linkBySimilarity(record);

    this.logger.debug(`admitted ${record.id} (importance ${importance})`);
    return record.id;
  }

  /** Counts a use of the item and returns its current state. */
  touch(id: string): MemoryItem {
    const record = this.requireLive(id);
    const nowIso = new Date(this.clock()).toISOString();
    record.accessCount += 1;
    if (nowIso > record.lastAccessedAt) record.lastAccessedAt = nowIso;
    return copyItem(record);
  }

  /** Read without counting as use. Archived items are returned for audit. */
  get(id: string): MemoryItem | null {
    const record = this.items.get(id);
    return record ? copyItem(record) : null;
  }

  /** Items in creation order, optionally restricted to one tier. */
  list(tier?: MemoryTier): MemoryItem[] {
    const out: MemoryItem[] = [];
    for (const record of this.items.values()) {
      if (tier === undefined || record.tier === tier) out.push(copyItem(record));
    }
    return out;
  }

  /** Symmetric link between two live items. */
  connect(a: string, b: string): void {
    if (a === b) {
      throw new InvalidInputError("An item cannot be connected to itself");
    }
    this.link(this.requireLive(a), this.requireLive(b));
  }

  evaluateStm(now: number = this.clock()): ScoredItem[] {
    return this.rank("stm", now);
  }

  evaluateLtm(now: number = this.clock()): ScoredItem[] {
    return this.rank("ltm", now);
  }

  promote(id: string): TransitionOutcome {
    const record = this.items.get(id);
    if (!record) throw new NotFoundError(id);
    if (record.tier === "ltm") return { changed: false, id, tier: "ltm", reason: "already-ltm" };
    if (record.tier === "archived") return { changed: false, id, tier: "archived", reason: "archived" };

    record.tier = "ltm";
    this.logger.debug(`promoted ${id} to LTM`);
    return { changed: true, id, from: "stm", to: "ltm" };
  }

  /** Terminal move. Severs every connection in both directions. */
  archive(id: string, reason: ArchiveReason = "manual"): TransitionOutcome {
    const record = this.items.get(id);
    if (!record) throw new NotFoundError(id);
    if (record.tier === "archived") return { changed: false, id, tier: "archived", reason: "already-archived" };

    const from = record.tier;
    for (const other of record.connections) {
      this.items.get(other)?.connections.delete(id);
    }
    record.connections.clear();
    record.tier = "archived";
    record.archivedAt = new Date(this.clock()).toISOString();
    record.metadata = { ...record.metadata, archiveReason: reason };
    this.logger.debug(`archived ${id} from ${from} (${reason})`);
    return { changed: true, id, from, to: "archived" };
  }

  /** Deep copy of every item, all tiers, in creation order. */
  exportItems(): MemoryItem[] {
    return this.list();
  }

  /**
   * Swap the whole item set in one assignment. Only recovery calls this,
   * after it has verified the incoming set.
   */
  replaceAll(items: readonly MemoryItem[]): void {
    const next = new Map<string, MemoryRecord>();
    for (const item of items) next.set(item.id, toRecord(item));
    this.items = next;
  }

  verifyIntegrity(): string[] {
    const issues = findIntegrityIssues(this.list());
    const { stm } = this.counts();
    if (stm > this.capacity) {
      issues.push(`STM holds ${stm} items, above capacity ${this.capacity}`);
    }
    return issues;
  }

  private rank(tier: "stm" | "ltm", now: number): ScoredItem[] {
    const weights = this.fitness.weights;
    const candidates: MemoryItem[] = [];
    for (const record of this.items.values()) {
      if (record.tier === tier) candidates.push(copyItem(record));
    }

    return candidates
      .map((item) => ({ item, score: this.fitness.score(item, now, weights) }))
      .sort((a, b) => b.score - a.score || Date.parse(a.item.createdAt) - Date.parse(b.item.createdAt))
      .map(({ item, score }) => ({ id: item.id, score }));
  }

  private evictForAdmission(now: number, keep: ReadonlySet<string>): void {
    const ranked = this.evaluateStm(now);
    const victim = [...ranked].reverse().find((entry) => !keep.has(entry.id)) ?? ranked[ranked.length - 1];
    if (!victim) return;
    this.archive(victim.id, "evicted");
    this.logger.info(`STM at capacity (${this.capacity}); evicted ${victim.id} (score ${victim.score.toFixed(3)})`);
  }

  private linkBySimilarity(record: MemoryRecord): void {
    const compare = this.similarity;
    const embedding = record.embedding;
    if (!compare || !embedding) return;

    for (const other of this.items.values()) {
      if (other.id === record.id || other.tier === "archived" || !other.embedding) continue;
      if (compare(embedding, other.embedding) >= this.connectionThreshold) {
        this.link(record, other);
      }
    }
  }

  private link(a: MemoryRecord, b: MemoryRecord): void {
    a.connections.add(b.id);
    b.connections.add(a.id);
  }

  private requireLive(id: string): MemoryRecord {
    const record = this.items.get(id);
    if (!record || record.tier === "archived") throw new NotFoundError(id);
    return record;
  }
}
