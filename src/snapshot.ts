import { z } from "zod";
import { RecoveryError } from "./errors.js";
import { MEMORY_TIERS, type MemoryItem, type Snapshot, type SubscriptionTable } from "./types.js";

export const SNAPSHOT_FORMAT_VERSION = 1;

const isoDate = z.string().refine((s) => !Number.isNaN(Date.parse(s)), "not an ISO-8601 timestamp");

const storedItemSchema = z.object({
  id: z.string().min(1),
  content: z.string(),
  embedding: z.string().optional(),
  metadata: z.record(z.unknown()),
  createdAt: isoDate,
  lastAccessedAt: isoDate,
  accessCount: z.number().int(),
  importance: z.number(),
  connections: z.array(z.string()),
  tier: z.enum(MEMORY_TIERS),
  archivedAt: isoDate.optional(),
});

const storedSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_FORMAT_VERSION),
  sequence: z.number().int().min(1),
  takenAt: isoDate,
  itemCount: z.number().int().min(0),
  items: z.array(storedItemSchema),
  subscriptions: z.record(z.array(z.string())),
});

type StoredItem = z.infer<typeof storedItemSchema>;

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Typed arrays cannot be frozen, so the embedding lives in a private copy
 * and every read of `embedding` hands out a fresh one.
 */
function freezeItem(item: MemoryItem): MemoryItem {
  const { embedding, ...rest } = item;
  const frozen: MemoryItem = {
    ...rest,
    metadata: deepFreeze(structuredClone({ ...item.metadata })),
    connections: Object.freeze([...item.connections]),
  };
  if (embedding) {
    const bytes = embedding.slice();
    Object.defineProperty(frozen, "embedding", { enumerable: true, get: () => bytes.slice() });
  }
  return Object.freeze(frozen);
}

export function createSnapshot(
  sequence: number,
  takenAt: string,
  items: readonly MemoryItem[],
  subscriptions: SubscriptionTable,
): Snapshot {
  const table: SubscriptionTable = {};
  for (const [topic, ids] of Object.entries(subscriptions)) table[topic] = [...ids];
  return Object.freeze({
    sequence,
    takenAt,
    items: Object.freeze(items.map(freezeItem)),
    subscriptions: Object.freeze(table),
  });
}

export function serializeSnapshot(snapshot: Snapshot): string {
  const items: StoredItem[] = snapshot.items.map((item) => ({
    id: item.id,
    content: item.content,
    ...(item.embedding ? { embedding: Buffer.from(item.embedding).toString("base64") } : {}),
    metadata: { ...item.metadata },
    createdAt: item.createdAt,
    lastAccessedAt: item.lastAccessedAt,
    accessCount: item.accessCount,
    importance: item.importance,
    connections: [...item.connections],
    tier: item.tier,
    ...(item.archivedAt ? { archivedAt: item.archivedAt } : {}),
  }));

  return JSON.stringify({
    version: SNAPSHOT_FORMAT_VERSION,
    sequence: snapshot.sequence,
    takenAt: snapshot.takenAt,
    itemCount: items.length,
    items,
    subscriptions: snapshot.subscriptions,
  });
}

/**
 * Parses and shape-checks a stored blob. The declared item count is
 * carried through so recovery can compare it with what actually loaded.
 */
export function deserializeSnapshot(blob: string): { snapshot: Snapshot; declaredItemCount: number } {
  let raw: unknown;
  try {
    raw = JSON.parse(blob);
  } catch (error) {
    throw new RecoveryError("Snapshot blob is not valid JSON", [], { cause: error });
  }

  const parsed = storedSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "snapshot"}: ${i.message}`);
    throw new RecoveryError("Snapshot blob failed validation", issues);
  }

  const data = parsed.data;
  const items: MemoryItem[] = data.items.map((stored) => {
    const { embedding, ...rest } = stored;
    return embedding === undefined
      ? rest
      : { ...rest, embedding: new Uint8Array(Buffer.from(embedding, "base64")) };
  });

  return {
    snapshot: createSnapshot(data.sequence, data.takenAt, items, data.subscriptions),
    declaredItemCount: data.itemCount,
  };
}
