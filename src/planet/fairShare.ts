import { z } from "zod";

import { elapsedSeconds, monotonicClock, type Clock } from "../runtime/clock.js";
import { PlanetConfigurationError } from "./errors.js";

/**
 * Fair-share admission of generation requests. Every explorer accumulates a
 * usage score that grows by a fixed cost per attempt and decays while the
 * explorer stays idle. Under contention, an explorer whose score exceeds the
 * average by more than the burst tolerance is refused until others catch up.
 * A lone active explorer is never refused.
 */

/** Tuning knobs of the limiter. */
export const FairShareTuningSchema = z
  .object({
    /** Explorers that requested within this window count as active. */
    contentionWindowMs: z.number().finite().positive(),
    /** Score removed per idle second. */
    decayPerSecond: z.number().finite().nonnegative(),
    /** Extra share granted on top of the average, split among active explorers. */
    allowedRequestBurst: z.number().finite().nonnegative(),
    /** Score added to the requester on every attempt, granted or not. */
    requestCost: z.number().finite().positive(),
  })
  .strict();

export type FairShareTuning = z.infer<typeof FairShareTuningSchema>;

export const DEFAULT_FAIR_SHARE_TUNING: Readonly<FairShareTuning> = Object.freeze({
  contentionWindowMs: 3_000,
  decayPerSecond: 0.5,
  allowedRequestBurst: 3.0,
  requestCost: 1.0,
});

export interface FairShareLimiterOptions extends Partial<FairShareTuning> {
  /** Millisecond clock, monotonic by default. */
  now?: Clock;
}

/** Usage record tracked per explorer. */
export interface ExplorerUsageSnapshot {
  explorerId: number;
  score: number;
  lastRequestAt: number;
}

/** Outcome of {@link FairShareLimiter.admit} with the figures it was based on. */
export interface AdmissionDecision {
  explorerId: number;
  granted: boolean;
  /** `sole-user` when the requester was the only active explorer. */
  basis: "sole-user" | "within-share" | "over-share";
  score: number;
  averageScore: number;
  tolerance: number;
  activeCount: number;
  trackedCount: number;
  decidedAt: number;
}

/**
 * Merges overrides into the defaults and validates the result.
 *
 * @throws PlanetConfigurationError when a knob is out of range.
 */
export function resolveFairShareTuning(overrides: Partial<FairShareTuning> = {}): FairShareTuning {
  const parsed = FairShareTuningSchema.safeParse({ ...DEFAULT_FAIR_SHARE_TUNING, ...overrides });
  if (!parsed.success) {
    throw new PlanetConfigurationError(
      "invalid fair-share tuning",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  return parsed.data;
}

interface UsageRecord {
  score: number;
  lastRequestAt: number;
}

export class FairShareLimiter {
  private readonly tuning: FairShareTuning;
  private readonly now: Clock;
  private readonly records = new Map<number, UsageRecord>();

  constructor(options: FairShareLimiterOptions = {}) {
    const { now, ...overrides } = options;
    this.tuning = resolveFairShareTuning(overrides);
    this.now = now ?? monotonicClock;
  }

  public getTuning(): FairShareTuning {
    return { ...this.tuning };
  }

  /**
   * Charges the requester and decides whether it may consume a cell. Only
   * call this when a charged cell is available: the attempt is billed even
   * when refused.
   */
  public admit(explorerId: number): AdmissionDecision {
    const at = this.now();

    // The requester is touched before decay so its own idle time is zero.
    let requester = this.records.get(explorerId);
    if (!requester) {
      requester = { score: 0, lastRequestAt: at };
      this.records.set(explorerId, requester);
    }
    requester.lastRequestAt = at;

    for (const record of this.records.values()) {
      const decay = this.tuning.decayPerSecond * this.idleSeconds(record, at);
      record.score = Math.max(0, record.score - decay);
    }

    requester.score += this.tuning.requestCost;

    const windowSeconds = this.tuning.contentionWindowMs / 1_000;
    let activeCount = 0;
    let totalScore = 0;
    for (const record of this.records.values()) {
      if (this.idleSeconds(record, at) < windowSeconds) {
        activeCount += 1;
      }
      totalScore += record.score;
    }

    const trackedCount = this.records.size;
    const tolerance = 1 + this.tuning.allowedRequestBurst / activeCount;
    const averageScore = totalScore / trackedCount;

    let basis: AdmissionDecision["basis"];
    if (activeCount === 1) {
      basis = "sole-user";
    } else if (requester.score <= averageScore * tolerance) {
      basis = "within-share";
    } else {
      basis = "over-share";
    }

    return {
      explorerId,
      granted: basis !== "over-share",
      basis,
      score: requester.score,
      averageScore,
      tolerance,
      activeCount,
      trackedCount,
      decidedAt: at,
    };
  }

  /** Usage records sorted by explorer id. */
  public snapshot(): ExplorerUsageSnapshot[] {
    return [...this.records.entries()]
      .map(([explorerId, record]) => ({ explorerId, score: record.score, lastRequestAt: record.lastRequestAt }))
      .sort((left, right) => left.explorerId - right.explorerId);
  }

  private idleSeconds(record: UsageRecord, at: number): number {
    return elapsedSeconds(record.lastRequestAt, at, this.tuning.contentionWindowMs / 1_000);
  }
}
