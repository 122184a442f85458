import { InvalidInputError } from "./errors.js";
import { FITNESS_DIMENSIONS, type FitnessBreakdown, type FitnessWeights, type MemoryItem } from "./types.js";

export interface FitnessConfig {
  decayConstantMs: number;
  saturationConstant: number;
  weights: FitnessWeights;
}

export const DEFAULT_WEIGHTS: FitnessWeights = Object.freeze({ recency: 0.3, frequency: 0.3, importance: 0.4 });

/** The fields scoring reads; lets the store score its internal records directly. */
export type Scorable = Pick<MemoryItem, "lastAccessedAt" | "accessCount" | "importance">;

/**
 * Rescales a weight vector to sum to 1 and freezes it.
 * Rejects negative, non-finite, or all-zero vectors.
 */
export function normalizeWeights(weights: Readonly<Record<string, number>>): FitnessWeights {
  let total = 0;
  for (const dim of FITNESS_DIMENSIONS) {
    const w = weights[dim];
    if (w === undefined || !Number.isFinite(w) || w < 0) {
      throw new InvalidInputError(`Weight "${dim}" must be a finite non-negative number`);
    }
    total += w;
  }
  if (total <= 0) {
    throw new InvalidInputError("At least one fitness weight must be positive");
  }

  return Object.freeze({
    recency: weights.recency / total,
    frequency: weights.frequency / total,
    importance: weights.importance / total,
  });
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export class FitnessEngine {
  private readonly decayConstantMs: number;
  private readonly saturationConstant: number;
  private current: FitnessWeights;

  constructor(config?: Partial<FitnessConfig>) {
    this.decayConstantMs = config?.decayConstantMs ?? 60 * 60 * 1000;
    this.saturationConstant = config?.saturationConstant ?? 5;
    if (!(this.decayConstantMs > 0) || !(this.saturationConstant > 0)) {
      throw new InvalidInputError("decayConstantMs and saturationConstant must be positive");
    }
    this.current = normalizeWeights(config?.weights ?? DEFAULT_WEIGHTS);
  }

  /** The live weight vector. Frozen; replaced, never patched. */
  get weights(): FitnessWeights {
    return this.current;
  }

  /** Swaps in a new vector in one assignment, renormalising it first. */
  replaceWeights(weights: Readonly<Record<string, number>>): FitnessWeights {
    const next = normalizeWeights(weights);
    this.current = next;
    return next;
  }

  recency(lastAccessedAt: string, now: number): number {
    const age = Math.max(0, now - Date.parse(lastAccessedAt));
    return Math.exp(-age / this.decayConstantMs);
  }

  frequency(accessCount: number): number {
    const count = Math.max(0, accessCount);
    return count / (count + this.saturationConstant);
  }

  /** Explicit weights are normalised before use; omitted weights mean the live vector. */
  breakdown(item: Scorable, now: number, weights?: FitnessWeights): FitnessBreakdown {
    const w = weights === undefined || weights === this.current ? this.current : normalizeWeights(weights);
    const recency = this.recency(item.lastAccessedAt, now);
    const frequency = this.frequency(item.accessCount);
    const importance = clamp01(item.importance);
    const score = clamp01(
      w.recency * recency + w.frequency * frequency + w.importance * importance,
    );
    return { recency, frequency, importance, score };
  }

  score(item: Scorable, now: number, weights?: FitnessWeights): number {
    return this.breakdown(item, now, weights).score;
  }
}
