import os from "os";
import path from "path";
import { z } from "zod";
import { InvalidInputError } from "./errors.js";
import type { LogLevel } from "./logger.js";

const weightsSchema = z.object({
  recency: z.number().min(0),
  frequency: z.number().min(0),
  importance: z.number().min(0),
});

export const engineConfigSchema = z
  .object({
    stmCapacity: z.number().int().min(1).default(10),
    ltmThreshold: z.number().min(0).max(1).default(0.6),
    pruneThreshold: z.number().min(0).max(1).default(0.3),
    maxPromotionsPerCycle: z.number().int().min(1).optional(),
    consolidationIntervalMs: z.number().int().positive().default(300_000),
    fitness: z
      .object({
        decayConstantMs: z.number().positive().default(60 * 60 * 1000),
        saturationConstant: z.number().positive().default(5),
        weights: weightsSchema.default({ recency: 0.3, frequency: 0.3, importance: 0.4 }),
      })
      .default({}),
    connectionThreshold: z.number().min(-1).max(1).default(0.85),
    bus: z
      .object({
        historySize: z.number().int().min(0).default(50),
      })
      .default({}),
    backup: z
      .object({
        snapshotIntervalMs: z.number().int().positive().default(24 * 60 * 60 * 1000),
        maxSnapshots: z.number().int().min(1).optional().default(10),
        maxAgeMs: z.number().int().positive().optional(),
      })
      .default({}),
    feedback: z
      .object({
        learningRate: z.number().positive().max(1).default(0.1),
        adaptEvery: z.number().int().min(1).default(20),
        adaptIntervalMs: z.number().int().positive().optional(),
        minWeight: z.number().min(0).max(1 / 3).default(0.05),
      })
      .default({}),
  })
  .refine((c) => c.pruneThreshold < c.ltmThreshold, {
    message: "pruneThreshold must be strictly less than ltmThreshold",
    path: ["pruneThreshold"],
  })
  .refine((c) => c.fitness.weights.recency + c.fitness.weights.frequency + c.fitness.weights.importance > 0, {
    message: "at least one fitness weight must be positive",
    path: ["fitness", "weights"],
  });

export type EngineConfig = z.output<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

export function parseConfig(input: EngineConfigInput = {}): EngineConfig {
  const result = engineConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`);
    throw new InvalidInputError(`Invalid engine configuration (${issues.join("; ")})`);
  }
  return result.data;
}

export interface RuntimeSettings {
  storagePath: string;
  storageKind: "sqlite" | "directory";
  logLevel: LogLevel;
  llm: {
    baseURL: string;
    model: string;
    apiKey: string;
  };
}

const DEFAULT_DATA_DIR = path.join(os.homedir(), ".tiered-memory-engine");

function numberFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const n = Number(value);
  if (!Number.isFinite(n)) {
    throw new InvalidInputError(`Expected a number, got "${value}"`);
  }
  return n;
}

const logLevelSchema = z.enum(["debug", "info", "warn", "error"]).default("info");
const storageKindSchema = z.enum(["sqlite", "directory"]).default("sqlite");

/**
 * Reads `MEMORY_*` and `LLM_*` variables for the stdio entry point.
 * Unset variables fall back to the schema defaults.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): {
  config: EngineConfig;
  runtime: RuntimeSettings;
} {
  const config = parseConfig({
    stmCapacity: numberFromEnv(env.MEMORY_STM_CAPACITY),
    ltmThreshold: numberFromEnv(env.MEMORY_LTM_THRESHOLD),
    pruneThreshold: numberFromEnv(env.MEMORY_PRUNE_THRESHOLD),
    consolidationIntervalMs: numberFromEnv(env.MEMORY_CONSOLIDATION_INTERVAL_MS),
    backup: {
      snapshotIntervalMs: numberFromEnv(env.MEMORY_SNAPSHOT_INTERVAL_MS),
      maxSnapshots: numberFromEnv(env.MEMORY_MAX_SNAPSHOTS),
      maxAgeMs: numberFromEnv(env.MEMORY_MAX_SNAPSHOT_AGE_MS),
    },
  });

  const level = logLevelSchema.safeParse(env.MEMORY_LOG_LEVEL);
  const kind = storageKindSchema.safeParse(env.MEMORY_STORAGE_KIND);
  if (!level.success || !kind.success) {
    throw new InvalidInputError("MEMORY_LOG_LEVEL or MEMORY_STORAGE_KIND has an unsupported value");
  }

  const defaultPath =
    kind.data === "sqlite" ? path.join(DEFAULT_DATA_DIR, "snapshots.db") : path.join(DEFAULT_DATA_DIR, "snapshots");

  return {
    config,
    runtime: {
      storagePath: env.MEMORY_STORAGE_PATH ?? defaultPath,
      storageKind: kind.data,
      logLevel: level.data,
      llm: {
        baseURL: env.LLM_BASE_URL ?? "http://localhost:1234/v1",
        model: env.LLM_MODEL ?? "local-model",
        apiKey: env.LLM_API_KEY ?? "lm-studio",
      },
    },
  };
}
