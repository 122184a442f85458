import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { errorMessage } from "./errors.js";
import type { MemoryEngine } from "./engine.js";
import { TOPICS } from "./knowledge-bus.js";
import { MEMORY_TIERS, FITNESS_DIMENSIONS, type MemoryItem } from "./types.js";

type ToolResult = { content: Array<{ type: "text"; text: string }>; isError?: boolean };

function ok(payload: unknown): ToolResult {
  return { content: [{ type: "text" as const, text: JSON.stringify(payload, null, 2) }] };
}

function fail(action: string, error: unknown): ToolResult {
  return {
    content: [{ type: "text" as const, text: `Error ${action}: ${errorMessage(error)}` }],
    isError: true,
  };
}

function formatItem(item: MemoryItem) {
  return {
    id: item.id,
    content: item.content,
    tier: item.tier,
    importance: item.importance,
    accessCount: item.accessCount,
    connections: item.connections,
    metadata: item.metadata,
    embeddingBytes: item.embedding?.byteLength ?? 0,
    createdAt: item.createdAt,
    lastAccessedAt: item.lastAccessedAt,
    ...(item.archivedAt ? { archivedAt: item.archivedAt } : {}),
  };
}

export function createServer(engine: MemoryEngine): McpServer {
  const server = new McpServer({
    name: "tiered-memory-engine",
    version: "1.0.0",
  });

  // ─── Tool: admit_memory ─────────────────────────────────────────────────────

  server.tool(
    "admit_memory",
    "Add content to short-term memory. If short-term memory is full, its weakest item is archived first. Strong items are promoted to long-term memory by the next consolidation cycle.",
    {
      content: z.string().describe("The text content to remember"),
      importance: z
        .number()
        .min(0)
        .max(1)
        .optional()
        .describe("Importance 0-1 (default 0.5). Ignored when assess_importance is true"),
      assess_importance: z
        .boolean()
        .optional()
        .default(false)
        .describe("Ask the configured LLM to rate importance instead of passing one"),
      metadata: z.record(z.unknown()).optional().describe("Optional key-value metadata (e.g. { \"agent\": \"planner\" })"),
      connections: z.array(z.string()).optional().describe("Ids of existing memories this one relates to"),
    },
    async ({ content, importance, assess_importance, metadata, connections }) => {
      try {
        const id = assess_importance
          ? await engine.admitAssessed(content, { metadata, connections })
          : engine.admit(content, { importance, metadata, connections });
        const item = engine.store.get(id);
        return ok({
          status: "admitted",
          id,
          importance: item?.importance,
          preview: content.length > 120 ? content.slice(0, 120) + "..." : content,
          stm: engine.store.counts().stm,
          capacity: engine.store.stmCapacity,
        });
      } catch (error) {
        return fail("admitting memory", error);
      }
    },
  );

  // ─── Tool: touch_memory ─────────────────────────────────────────────────────

  server.tool(
    "touch_memory",
    "Record a use of a memory (raises its access count and recency) and return it.",
    {
      id: z.string().describe("The id of the memory"),
    },
    async ({ id }) => {
      try {
        return ok(formatItem(engine.store.touch(id)));
      } catch (error) {
        return fail("touching memory", error);
      }
    },
  );

  // ─── Tool: inspect_memory ───────────────────────────────────────────────────

  server.tool(
    "inspect_memory",
    "Read a memory without counting it as a use, with its current fitness breakdown. Archived memories are returned for audit.",
    {
      id: z.string().describe("The id of the memory"),
    },
    async ({ id }) => {
      const item = engine.store.get(id);
      if (!item) {
        return ok({ status: "not found", id });
      }
      const fitness = item.tier === "archived" ? null : engine.fitness.breakdown(item, engine.now());
      return ok({ ...formatItem(item), fitness });
    },
  );

  // ─── Tool: list_memories ────────────────────────────────────────────────────

  server.tool(
    "list_memories",
    "List memories in creation order, optionally restricted to one tier. Results are paginated.",
    {
      tier: z.enum(MEMORY_TIERS).optional().describe("stm, ltm or archived (default: all)"),
      limit: z.number().int().min(1).max(500).optional().default(50).describe("Maximum number to return (default: 50)"),
      offset: z.number().int().min(0).optional().default(0).describe("Number to skip (default: 0)"),
    },
    async ({ tier, limit, offset }) => {
      const all = engine.store.list(tier);
      const page = all.slice(offset, offset + limit).map(formatItem);
      return ok({ total: all.length, returned: page.length, offset, memories: page });
    },
  );

  // ─── Tool: connect_memories ─────────────────────────────────────────────────

  server.tool(
    "connect_memories",
    "Link two live memories as related. The link is symmetric and is removed when either side is archived.",
    {
      a: z.string().describe("First memory id"),
      b: z.string().describe("Second memory id"),
    },
    async ({ a, b }) => {
      try {
        engine.store.connect(a, b);
        return ok({ status: "connected", a, b });
      } catch (error) {
        return fail("connecting memories", error);
      }
    },
  );

  // ─── Tool: run_consolidation ────────────────────────────────────────────────

  server.tool(
    "run_consolidation",
    "Run one consolidation cycle now: promote strong short-term memories, enforce capacity, prune weak long-term memories.",
    async () => {
      try {
        return ok(await engine.consolidation.runCycle());
      } catch (error) {
        return fail("running consolidation", error);
      }
    },
  );

  // ─── Tool: create_snapshot ──────────────────────────────────────────────────

  server.tool(
    "create_snapshot",
    "Write a full snapshot of all memories and bus subscriptions to durable storage.",
    async () => {
      try {
        const snapshot = await engine.backup.snapshot();
        return ok({ status: "written", sequence: snapshot.sequence, takenAt: snapshot.takenAt, items: snapshot.items.length });
      } catch (error) {
        return fail("creating snapshot", error);
      }
    },
  );

  // ─── Tool: recover_snapshot ─────────────────────────────────────────────────

  server.tool(
    "recover_snapshot",
    "Replace all memory state with a stored snapshot. Either the whole snapshot is restored and verified, or nothing changes.",
    {
      sequence: z.number().int().min(1).optional().describe("Snapshot sequence number (default: most recent)"),
    },
    async ({ sequence }) => {
      try {
        const report = sequence === undefined ? await engine.backup.recoverLatest() : await engine.backup.recoverFrom(sequence);
        return ok({ status: "recovered", ...report });
      } catch (error) {
        return fail("recovering snapshot", error);
      }
    },
  );

  // ─── Tool: record_feedback ──────────────────────────────────────────────────

  server.tool(
    "record_feedback",
    "Record one agent's feedback about another agent's use of memory. Feedback gradually shifts how fitness is weighted.",
    {
      source_agent: z.string().min(1).describe("Agent giving the feedback"),
      target_agent: z.string().min(1).describe("Agent the feedback is about"),
      dimension: z.enum(FITNESS_DIMENSIONS).describe("Which fitness signal should count more (positive) or less (negative)"),
      rating: z.number().min(-1).max(1).describe("-1 to 1"),
      item_id: z.string().optional().describe("Memory the feedback refers to"),
      note: z.string().optional().describe("Free-text explanation"),
    },
    async ({ source_agent, target_agent, dimension, rating, item_id, note }) => {
      try {
        const record = engine.feedback.record(source_agent, target_agent, { dimension, rating, itemId: item_id, note });
        return ok({ status: "recorded", recordedAt: record.recordedAt, weights: engine.fitness.weights });
      } catch (error) {
        return fail("recording feedback", error);
      }
    },
  );

  // ─── Tool: share_memory ─────────────────────────────────────────────────────

  server.tool(
    "share_memory",
    "Share a live memory with other agents by publishing it on a bus topic, tagged with the sharing agent.",
    {
      id: z.string().describe("The id of the memory to share"),
      source_agent: z.string().min(1).describe("Agent sharing the memory"),
      topic: z.string().min(1).optional().default(TOPICS.shared).describe(`Bus topic (default: ${TOPICS.shared})`),
    },
    async ({ id, source_agent, topic }) => {
      try {
        const report = engine.share(id, source_agent, topic);
        return ok({ status: "shared", id, ...report });
      } catch (error) {
        return fail("sharing memory", error);
      }
    },
  );

  // ─── Tool: recent_knowledge ─────────────────────────────────────────────────

  server.tool(
    "recent_knowledge",
    "Read the most recent memories shared on a bus topic, newest last, with who shared them and their confidence.",
    {
      topic: z.string().min(1).optional().default(TOPICS.shared).describe(`Bus topic (default: ${TOPICS.shared})`),
      limit: z.number().int().min(1).max(100).optional().default(10).describe("Maximum number to return (default: 10)"),
    },
    async ({ topic, limit }) => {
      const entries = engine.bus.recent(topic).slice(-limit);
      return ok({
        topic,
        returned: entries.length,
        knowledge: entries.map(({ item, metadata }) => ({
          id: item.id,
          content: item.content,
          tier: item.tier,
          ...metadata,
        })),
      });
    },
  );

  // ─── Tool: engine_status ────────────────────────────────────────────────────

  server.tool(
    "engine_status",
    "Report tier counts, fitness weights, the last consolidation and snapshot, and any integrity issues.",
    async () => {
      const last = engine.consolidation.lastResult;
      return ok({
        running: engine.running,
        tiers: engine.store.counts(),
        capacity: engine.store.stmCapacity,
        weights: engine.fitness.weights,
        topics: engine.bus.subscriptionTable(),
        lastConsolidation: last
          ? { finishedAt: last.finishedAt, promoted: last.promotedCount, archived: last.archivedCount }
          : null,
        lastSnapshot: engine.backup.lastSnapshot?.sequence ?? null,
        integrityIssues: engine.store.verifyIntegrity(),
      });
    },
  );

  return server;
}
