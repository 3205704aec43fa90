import { randomInt } from "node:crypto";
import { logger } from "../core/logger.js";

export type JitterRange = {
  minSats: number;
  maxSats: number;
};

export type PaymentAssignment = {
  jitterSats: number;
  expectedSats: bigint;
};

/**
 * Probability that two independent draws land within `toleranceSats` of each other, i.e. that a payment
 * for one order also falls in the other's acceptance window.
 */
export function pairCollisionProbability(range: JitterRange, toleranceSats: number): number {
  const size = range.maxSats - range.minSats + 1;
  if (size <= 0) return 1;
  return Math.min(1, (2 * toleranceSats + 1) / size);
}

/**
 * Smallest jitter range size R for which `concurrentOrders` pending orders with the same base price
 * collide with probability at most `targetProbability` (union bound over all pairs).
 */
export function jitterUpperBound(args: {
  targetProbability: number;
  concurrentOrders: number;
  toleranceSats: number;
}): number {
  const { targetProbability, concurrentOrders, toleranceSats } = args;
  if (!(targetProbability > 0 && targetProbability < 1)) {
    throw new Error(`targetProbability must be in (0, 1), got ${targetProbability}`);
  }
  const k = Math.max(2, Math.floor(concurrentOrders));
  const pairs = (k * (k - 1)) / 2;
  return Math.ceil((pairs * (2 * toleranceSats + 1)) / targetProbability);
}

export class PaymentDisambiguator {
  private readonly range: JitterRange;
  private readonly toleranceSats: bigint;
  private readonly maxDraws: number;
  private readonly random: (min: number, max: number) => number;

  constructor(args: {
    range: JitterRange;
    toleranceSats: number;
    maxDraws?: number;
    /** Inclusive bounds. Defaults to a CSPRNG draw. */
    random?: (min: number, max: number) => number;
  }) {
    const { minSats, maxSats } = args.range;
    if (!Number.isInteger(minSats) || !Number.isInteger(maxSats) || minSats < 1 || maxSats < minSats) {
      throw new Error(`Invalid jitter range ${minSats}..${maxSats}`);
    }
    this.range = args.range;
    this.toleranceSats = BigInt(args.toleranceSats);
    this.maxDraws = Math.max(1, args.maxDraws ?? 10);
    this.random = args.random ?? ((min, max) => randomInt(min, max + 1));
  }

  /**
   * expected = base + jitter. Draws again while the candidate sits inside the acceptance window of an
   * amount some pending order already expects.
   */
  assign(baseSats: bigint, pendingExpected: readonly bigint[] = []): PaymentAssignment {
    let candidate: PaymentAssignment | null = null;

    for (let draw = 0; draw < this.maxDraws; draw++) {
      const jitterSats = this.random(this.range.minSats, this.range.maxSats);
      candidate = { jitterSats, expectedSats: baseSats + BigInt(jitterSats) };
      const expected = candidate.expectedSats;
      const clash = pendingExpected.some((p) => (p > expected ? p - expected : expected - p) <= this.toleranceSats);
      if (!clash) return candidate;
    }

    logger.warn(
      `jitter: could not avoid pending amounts after ${this.maxDraws} draws (pending=${pendingExpected.length}), using last draw`
    );
    if (!candidate) throw new Error("jitter: no draw made");
    return candidate;
  }
}
