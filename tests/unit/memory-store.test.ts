import { describe, it, expect, beforeEach } from "vitest";
import { MemoryStore, findIntegrityIssues } from "../../src/memory-store.js";
import { FitnessEngine } from "../../src/fitness.js";
import { InvalidInputError, NotFoundError } from "../../src/errors.js";
import { float32Cosine } from "../../src/similarity.js";
import { createClock, T0, type TestClock } from "../helpers/clock.js";
import { fakeEmbedding } from "../helpers/mock-embeddings.js";

const IMPORTANCE_ONLY = { recency: 0, frequency: 0, importance: 1 };

describe("MemoryStore", () => {
  let clock: TestClock;
  let store: MemoryStore;

  beforeEach(() => {
    clock = createClock();
    store = new MemoryStore({ stmCapacity: 3 }, { clock: clock.now });
  });

  // ── admit ─────────────────────────────────────────────────

  describe("admit()", () => {
    it("creates an STM item with one access and a UUID", () => {
      const id = store.admit("TypeScript is great", { importance: 0.7 });
      const item = store.get(id);

      expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
      expect(item).toMatchObject({
        id,
        content: "TypeScript is great",
        tier: "stm",
        accessCount: 1,
        importance: 0.7,
        connections: [],
        createdAt: "2026-01-01T00:00:00.000Z",
        lastAccessedAt: "2026-01-01T00:00:00.000Z",
      });
    });

    it("defaults importance to 0.5 and metadata to {}", () => {
      const item = store.get(store.admit("note"));
      expect(item?.importance).toBe(0.5);
      expect(item?.metadata).toEqual({});
    });

    it("keeps metadata and the embedding blob", () => {
      const embedding = fakeEmbedding("note");
      const item = store.get(store.admit("note", { metadata: { agent: "planner" }, embedding }));
      expect(item?.metadata).toEqual({ agent: "planner" });
      expect(item?.embedding).toEqual(embedding);
    });

    it("rejects empty or blank content", () => {
      expect(() => store.admit("")).toThrow(InvalidInputError);
      expect(() => store.admit("   ")).toThrow(InvalidInputError);
      expect(store.size).toBe(0);
    });

    it("rejects importance outside [0,1]", () => {
      expect(() => store.admit("x", { importance: 1.5 })).toThrow("importance must be within [0,1], got 1.5");
      expect(() => store.admit("x", { importance: -0.1 })).toThrow(InvalidInputError);
    });

    it("never reuses ids", () => {
      const ids = new Set<string>();
      for (let i = 0; i < 50; i++) ids.add(store.admit(`item ${i}`));
      expect(ids.size).toBe(50);
    });

    it("links requested connections symmetrically", () => {
      const a = store.admit("a");
      const b = store.admit("b", { connections: [a] });
      expect(store.get(a)?.connections).toEqual([b]);
      expect(store.get(b)?.connections).toEqual([a]);
    });

    it("rejects an unknown connection without admitting anything", () => {
      expect(() => store.admit("b", { connections: ["missing"] })).toThrow(NotFoundError);
      expect(store.size).toBe(0);
    });
  });

  // ── capacity ──────────────────────────────────────────────

  describe("STM capacity", () => {
    it("archives the lowest-fitness item when a third item arrives at capacity 2", () => {
      const small = new MemoryStore({ stmCapacity: 2 }, { clock: clock.now });
      const a = small.admit("A", { importance: 0.9 });
      const b = small.admit("B", { importance: 0.1 });
      const c = small.admit("C", { importance: 0.1 });

      expect(small.list("stm").map((i) => i.id)).toEqual([a, c]);
      expect(small.get(b)?.tier).toBe("archived");
      expect(small.get(b)?.metadata).toEqual({ archiveReason: "evicted" });
    });

    it("never exceeds capacity across many admissions", () => {
      for (let i = 0; i < 40; i++) {
        store.admit(`item ${i}`, { importance: (i * 37) % 100 / 100 });
        clock.advance(1000);
        expect(store.counts().stm).toBeLessThanOrEqual(3);
      }
      expect(store.counts()).toEqual({ stm: 3, ltm: 0, archived: 37 });
    });

    it("does not count LTM or archived items against capacity", () => {
      const first = store.admit("first");
      store.promote(first);
      store.admit("second");
      store.admit("third");
      store.admit("fourth");
      expect(store.counts()).toEqual({ stm: 3, ltm: 1, archived: 0 });
    });

    it("evicts the newest of equally weak items, keeping the older one", () => {
      const s = new MemoryStore(
        { stmCapacity: 3 },
        { clock: clock.now, fitness: new FitnessEngine({ weights: IMPORTANCE_ONLY }) },
      );
      const older = s.admit("older", { importance: 0.5 });
      clock.advance(1000);
      const newer = s.admit("newer", { importance: 0.5 });
      const strong = s.admit("strong", { importance: 0.9 });
      s.admit("incoming", { importance: 0.2 });

      expect(s.get(newer)?.tier).toBe("archived");
      expect(s.get(older)?.tier).toBe("stm");
      expect(s.get(strong)?.tier).toBe("stm");
    });

    it("spares an item the newcomer asks to connect to", () => {
      const small = new MemoryStore(
        { stmCapacity: 2 },
        { clock: clock.now, fitness: new FitnessEngine({ weights: IMPORTANCE_ONLY }) },
      );
      const weak = small.admit("weak", { importance: 0.1 });
      const strong = small.admit("strong", { importance: 0.9 });
      const linked = small.admit("linked", { importance: 0.5, connections: [weak] });

      expect(small.get(strong)?.tier).toBe("archived");
      expect(small.get(weak)?.connections).toEqual([linked]);
    });
  });

  // ── touch / get ───────────────────────────────────────────

  describe("touch()", () => {
    it("increments access count and updates last access", () => {
      const id = store.admit("note");
      clock.advance(5000);
      const item = store.touch(id);
      expect(item.accessCount).toBe(2);
      expect(item.lastAccessedAt).toBe("2026-01-01T00:00:05.000Z");
      expect(item.createdAt).toBe("2026-01-01T00:00:00.000Z");
    });

    it("returns a copy that later touches do not change", () => {
      const id = store.admit("note");
      const first = store.touch(id);
      store.touch(id);
      expect(first.accessCount).toBe(2);
      expect(store.get(id)?.accessCount).toBe(3);
    });

    it("never moves last access backwards when the clock does", () => {
      const id = store.admit("note");
      clock.set(T0 - 60_000);
      const item = store.touch(id);
      expect(item.accessCount).toBe(2);
      expect(item.lastAccessedAt).toBe("2026-01-01T00:00:00.000Z");
    });

    it("fails for unknown ids", () => {
      expect(() => store.touch("nope")).toThrow(NotFoundError);
    });

    it("fails for archived ids", () => {
      const id = store.admit("note");
      store.archive(id);
      expect(() => store.touch(id)).toThrow("Memory " + id + " not found");
    });
  });

  describe("get()", () => {
    it("returns null for unknown ids", () => {
      expect(store.get("nope")).toBeNull();
    });

    it("does not count as a use", () => {
      const id = store.admit("note");
      store.get(id);
      store.get(id);
      expect(store.get(id)?.accessCount).toBe(1);
    });
  });

  // ── evaluation ────────────────────────────────────────────

  describe("evaluateStm() / evaluateLtm()", () => {
    it("orders by score, oldest first among ties", () => {
      const s = new MemoryStore(
        { stmCapacity: 10 },
        { clock: clock.now, fitness: new FitnessEngine({ weights: IMPORTANCE_ONLY }) },
      );
      const p = s.admit("p", { importance: 0.5 });
      clock.advance(1000);
      const q = s.admit("q", { importance: 0.5 });
      const r = s.admit("r", { importance: 0.9 });

      expect(s.evaluateStm(clock.now())).toEqual([
        { id: r, score: 0.9 },
        { id: p, score: 0.5 },
        { id: q, score: 0.5 },
      ]);
    });

    it("scores only the requested tier and changes nothing", () => {
      const a = store.admit("a");
      const b = store.admit("b");
      store.promote(b);

      expect(store.evaluateStm().map((e) => e.id)).toEqual([a]);
      expect(store.evaluateLtm().map((e) => e.id)).toEqual([b]);
      expect(store.get(a)?.accessCount).toBe(1);
    });

    it("excludes archived items", () => {
      const a = store.admit("a");
      store.archive(a);
      expect(store.evaluateStm()).toEqual([]);
      expect(store.evaluateLtm()).toEqual([]);
    });
  });

  // ── promote / archive ─────────────────────────────────────

  describe("promote()", () => {
    it("moves an STM item to LTM", () => {
      const id = store.admit("note");
      expect(store.promote(id)).toEqual({ changed: true, id, from: "stm", to: "ltm" });
      expect(store.get(id)?.tier).toBe("ltm");
    });

    it("is idempotent", () => {
      const id = store.admit("note");
      store.promote(id);
      const afterOnce = store.exportItems();
      expect(store.promote(id)).toEqual({ changed: false, id, tier: "ltm", reason: "already-ltm" });
      expect(store.exportItems()).toEqual(afterOnce);
    });

    it("reports archived items without reviving them", () => {
      const id = store.admit("note");
      store.archive(id);
      expect(store.promote(id)).toEqual({ changed: false, id, tier: "archived", reason: "archived" });
      expect(store.get(id)?.tier).toBe("archived");
    });

    it("throws NotFoundError for unknown ids", () => {
      expect(() => store.promote("nope")).toThrow(NotFoundError);
    });
  });

  describe("archive()", () => {
    it("moves STM and LTM items to the archive with a timestamp", () => {
      const a = store.admit("a");
      const b = store.admit("b");
      store.promote(b);
      clock.advance(2000);

      expect(store.archive(a)).toEqual({ changed: true, id: a, from: "stm", to: "archived" });
      expect(store.archive(b)).toEqual({ changed: true, id: b, from: "ltm", to: "archived" });
      expect(store.get(a)?.archivedAt).toBe("2026-01-01T00:00:02.000Z");
    });

    it("removes the item from every connected item", () => {
      const hub = store.admit("hub");
      const left = store.admit("left", { connections: [hub] });
      const right = store.admit("right", { connections: [hub, left] });

      store.archive(hub);

      expect(store.get(hub)?.connections).toEqual([]);
      expect(store.get(left)?.connections).toEqual([right]);
      expect(store.get(right)?.connections).toEqual([left]);
      expect(store.verifyIntegrity()).toEqual([]);
    });

    it("is a reported no-op the second time", () => {
      const id = store.admit("a");
      store.archive(id);
      expect(store.archive(id)).toEqual({ changed: false, id, tier: "archived", reason: "already-archived" });
    });

    it("keeps archived items for audit", () => {
      const id = store.admit("a");
      store.archive(id);
      expect(store.list("archived").map((i) => i.content)).toEqual(["a"]);
      expect(store.size).toBe(0);
    });
  });

  // ── connections ───────────────────────────────────────────

  describe("connect()", () => {
    it("links two live items both ways", () => {
      const a = store.admit("a");
      const b = store.admit("b");
      store.connect(a, b);
      expect(store.get(a)?.connections).toEqual([b]);
      expect(store.get(b)?.connections).toEqual([a]);
    });

    it("refuses self-links and archived targets", () => {
      const a = store.admit("a");
      const b = store.admit("b");
      store.archive(b);
      expect(() => store.connect(a, a)).toThrow(InvalidInputError);
      expect(() => store.connect(a, b)).toThrow(NotFoundError);
    });

    it("links by embedding similarity when a comparator is configured", () => {
      const s = new MemoryStore(
        { stmCapacity: 5, connectionThreshold: 0.99 },
        { clock: clock.now, similarity: float32Cosine },
      );
      const first = s.admit("first", { embedding: fakeEmbedding("alpha") });
      const unrelated = s.admit("unrelated", { embedding: fakeEmbedding("a different sentence") });
      const twin = s.admit("twin", { embedding: fakeEmbedding("alpha") });

      expect(s.get(twin)?.connections).toEqual([first]);
      expect(s.get(unrelated)?.connections).toEqual([]);
    });
  });

  // ── export / replace ──────────────────────────────────────

  describe("exportItems() / replaceAll()", () => {
    it("round-trips the full item set", () => {
      const a = store.admit("a", { importance: 0.8, embedding: fakeEmbedding("a") });
      const b = store.admit("b", { connections: [a] });
      store.promote(a);
      store.archive(store.admit("c"));
      const exported = store.exportItems();

      const other = new MemoryStore({ stmCapacity: 3 }, { clock: clock.now });
      other.replaceAll(exported);

      expect(other.exportItems()).toEqual(exported);
      expect(other.get(b)?.connections).toEqual([a]);
    });

    it("is isolated from the array it was given", () => {
      const items = [...store.exportItems()];
      const a = store.admit("a");
      const copy = store.exportItems();
      store.replaceAll(copy);
      store.touch(a);
      expect(copy[0].accessCount).toBe(1);
      expect(items).toEqual([]);
    });
  });
});

describe("findIntegrityIssues()", () => {
  const base = {
    content: "x",
    metadata: {},
    createdAt: "2026-01-01T00:00:00.000Z",
    lastAccessedAt: "2026-01-01T00:00:00.000Z",
    accessCount: 1,
    importance: 0.5,
  };

  it("accepts a consistent set", () => {
    expect(
      findIntegrityIssues([
        { ...base, id: "a", tier: "stm", connections: ["b"] },
        { ...base, id: "b", tier: "ltm", connections: ["a"] },
      ]),
    ).toEqual([]);
  });

  it("reports dangling connections", () => {
    expect(findIntegrityIssues([{ ...base, id: "a", tier: "stm", connections: ["ghost"] }])).toEqual([
      "item a references missing connection ghost",
    ]);
  });

  it("reports an item present in two tiers", () => {
    expect(
      findIntegrityIssues([
        { ...base, id: "a", tier: "stm", connections: [] },
        { ...base, id: "a", tier: "ltm", connections: [] },
      ]),
    ).toEqual(["item a appears in more than one tier (stm, ltm)"]);
  });

  it("reports one-way links and links to archived items", () => {
    expect(
      findIntegrityIssues([
        { ...base, id: "a", tier: "stm", connections: ["b"] },
        { ...base, id: "b", tier: "stm", connections: [] },
        { ...base, id: "c", tier: "stm", connections: ["d"] },
        { ...base, id: "d", tier: "archived", connections: ["c"] },
      ]),
    ).toEqual([
      "connection a -> b has no back-reference",
      "archived item in connection c <-> d",
      "archived item in connection d <-> c",
    ]);
  });

  it("reports broken timestamps, counts and importance", () => {
    expect(
      findIntegrityIssues([
        {
          ...base,
          id: "a",
          tier: "stm",
          connections: [],
          lastAccessedAt: "2025-12-31T00:00:00.000Z",
          accessCount: 0,
          importance: 2,
        },
      ]),
    ).toEqual([
      "item a was last accessed before it was created",
      "item a has invalid access count 0",
      "item a has importance 2 outside [0,1]",
    ]);
  });
});
