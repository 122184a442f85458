import { z } from "zod";
import { InvalidInputError } from "./errors.js";
import { FitnessEngine } from "./fitness.js";
import { silentLogger, type Logger } from "./logger.js";
import { RecurringTask } from "./recurring-task.js";
import {
  FITNESS_DIMENSIONS,
  type Clock,
  type Feedback,
  type FeedbackRecord,
  type FitnessDimension,
  type FitnessWeights,
  type Subscriber,
} from "./types.js";

export const feedbackSchema = z.object({
  dimension: z.enum(FITNESS_DIMENSIONS),
  rating: z.number().min(-1).max(1),
  itemId: z.string().optional(),
  note: z.string().max(2000).optional(),
});

export interface FeedbackConfig {
  learningRate: number;
  /** Adapt after this many pending records. */
  adaptEvery: number;
  /** Optional timer-driven adaptation. */
  adaptIntervalMs?: number;
  /** Floor every weight keeps once the vector is normalised. At most 1/3. */
  minWeight: number;
}

export interface FeedbackDeps {
  fitness: FitnessEngine;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Normalises to sum 1 with no weight below `min`. Weights under the floor are
 * pinned to it and the rest share what is left in proportion, repeated until
 * nothing is under. An all-zero vector becomes uniform.
 */
export function floorWeights(raw: Readonly<Record<FitnessDimension, number>>, min: number): FitnessWeights {
  const total = FITNESS_DIMENSIONS.reduce((sum, dim) => sum + raw[dim], 0);
  const w: Record<FitnessDimension, number> = { recency: 0, frequency: 0, importance: 0 };
  for (const dim of FITNESS_DIMENSIONS) {
    w[dim] = total > 0 ? raw[dim] / total : 1 / FITNESS_DIMENSIONS.length;
  }

  const pinned = new Set<FitnessDimension>();
  for (;;) {
    const low = FITNESS_DIMENSIONS.filter((dim) => !pinned.has(dim) && w[dim] < min);
    if (low.length === 0) break;
    for (const dim of low) pinned.add(dim);

    const free = FITNESS_DIMENSIONS.filter((dim) => !pinned.has(dim));
    const budget = 1 - pinned.size * min;
    const freeTotal = free.reduce((sum, dim) => sum + w[dim], 0);
    for (const dim of pinned) w[dim] = min;
    for (const dim of free) {
      w[dim] = freeTotal > 0 ? (w[dim] / freeTotal) * budget : budget / free.length;
    }
  }
  return Object.freeze(w);
}

/**
 * Slow outer loop: collects agent feedback and nudges the fitness weights.
 * Each adaptation is a single wholesale weight replacement.
 */
export class FeedbackController {
  private readonly config: FeedbackConfig;
  private readonly fitness: FitnessEngine;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly log: FeedbackRecord[] = [];
  private pending: FeedbackRecord[] = [];
  private readonly task: RecurringTask | null;

  constructor(config: FeedbackConfig, deps: FeedbackDeps) {
    if (!(config.minWeight >= 0 && config.minWeight * FITNESS_DIMENSIONS.length <= 1)) {
      throw new InvalidInputError(`minWeight must be at most 1/3, got ${config.minWeight}`);
    }
    this.config = config;
    this.fitness = deps.fitness;
    this.clock = deps.clock ?? Date.now;
    this.logger = deps.logger ?? silentLogger;
    this.task =
      config.adaptIntervalMs === undefined
        ? null
        : new RecurringTask("feedback", config.adaptIntervalMs, async () => this.adapt(), this.logger);
  }

  start(): void {
    this.task?.start();
  }

  async stop(): Promise<void> {
    await this.task?.stop();
  }

  record(sourceAgent: string, targetAgent: string, feedback: Feedback): FeedbackRecord {
    if (sourceAgent.trim() === "" || targetAgent.trim() === "") {
      throw new InvalidInputError("sourceAgent and targetAgent must be non-empty");
    }
    const parsed = feedbackSchema.safeParse(feedback);
    if (!parsed.success) {
      throw new InvalidInputError(`Invalid feedback: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
    }

    const record: FeedbackRecord = Object.freeze({
      sourceAgent,
      targetAgent,
      feedback: Object.freeze({ ...parsed.data }),
      recordedAt: new Date(this.clock()).toISOString(),
    });
    this.log.push(record);
    this.pending.push(record);

    if (this.pending.length >= this.config.adaptEvery) {
      this.adapt();
    }
    return record;
  }

  history(): readonly FeedbackRecord[] {
    return [...this.log];
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  /**
   * Apply the mean rating per dimension of the pending records:
   * `w' = w · (1 + learningRate · mean)`, normalised, then floored at
   * minWeight. Returns the new weights, or null when nothing was pending.
   */
  adapt(): FitnessWeights | null {
    if (this.pending.length === 0) return null;
    const batch = this.pending;
    this.pending = [];

    const sums: Record<FitnessDimension, { total: number; n: number }> = {
      recency: { total: 0, n: 0 },
      frequency: { total: 0, n: 0 },
      importance: { total: 0, n: 0 },
    };
    for (const { feedback } of batch) {
      sums[feedback.dimension].total += feedback.rating;
      sums[feedback.dimension].n += 1;
    }

    const current = this.fitness.weights;
    const next: Record<FitnessDimension, number> = { ...current };
    for (const dim of FITNESS_DIMENSIONS) {
      const { total, n } = sums[dim];
      const mean = n === 0 ? 0 : total / n;
      next[dim] = Math.max(0, current[dim] * (1 + this.config.learningRate * mean));
    }

    const applied = this.fitness.replaceWeights(floorWeights(next, this.config.minWeight));
    this.logger.info(
      `weights adapted from ${batch.length} record(s): recency=${applied.recency.toFixed(3)} frequency=${applied.frequency.toFixed(3)} importance=${applied.importance.toFixed(3)}`,
    );
    return applied;
  }

  /** Bus subscriber that records every `feedback` message it receives. */
  subscriber(id = "feedback-controller"): Subscriber {
    return {
      id,
      handle: (message) => {
        if (message.kind !== "feedback") return;
        this.record(message.sourceAgent, message.targetAgent, message.feedback);
      },
    };
  }
}
