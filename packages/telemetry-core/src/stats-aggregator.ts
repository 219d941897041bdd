/**
 * Periodic min/max/mean and percentile lows over a sample window.
 *
 * Recomputation is rate-limited: calls to `update` inside the interval leave
 * the previous snapshot in place, which bounds sorting work at high frame
 * rates.
 */

import { monotonicClock } from './clock'
import type { Clock, StatsSnapshot } from './types'

// ─── Constants ───────────────────────────────────────────────────────────────

/** Minimum spacing between recomputations (ms) */
export const DEFAULT_STATS_INTERVAL_MS = 500

/** Fraction for the "0.1% low" */
export const PERCENTILE_0_1 = 0.001

/** Fraction for the "1% low" */
export const PERCENTILE_1 = 0.01

export const EMPTY_STATS: StatsSnapshot = Object.freeze({
  average: 0,
  min: 0,
  max: 0,
  percentile0_1: 0,
  percentile1: 0,
})

// ─── Percentile ──────────────────────────────────────────────────────────────

/**
 * Percentile by linear interpolation between closest ranks.
 *
 * @param sorted ascending samples
 * @param p fraction in [0, 1]
 * @returns 0 for an empty input
 */
export function percentile(sorted: ArrayLike<number>, p: number): number {
  const n = sorted.length
  if (n === 0) return 0
  if (n === 1) return sorted[0]!

  const idx = p * (n - 1)
  const lo = Math.min(Math.max(Math.floor(idx), 0), n - 1)
  const hi = Math.min(Math.max(Math.ceil(idx), 0), n - 1)
  if (lo === hi) return sorted[lo]!

  const weight = idx - lo
  return sorted[lo]! * (1 - weight) + sorted[hi]! * weight
}

/** Full statistics for one sample set. Does not mutate `samples`. */
export function computeStats(samples: ArrayLike<number>): StatsSnapshot {
  if (samples.length === 0) return EMPTY_STATS

  const sorted = Float64Array.from(samples).sort()
  let sum = 0
  for (let i = 0; i < sorted.length; i++) sum += sorted[i]!

  return Object.freeze({
    average: sum / sorted.length,
    min: sorted[0]!,
    max: sorted[sorted.length - 1]!,
    percentile0_1: percentile(sorted, PERCENTILE_0_1),
    percentile1: percentile(sorted, PERCENTILE_1),
  })
}

// ─── Aggregator ──────────────────────────────────────────────────────────────

export class StatsAggregator {
  private stats: StatsSnapshot = EMPTY_STATS
  private lastUpdate: number

  constructor(
    private readonly intervalMs = DEFAULT_STATS_INTERVAL_MS,
    private readonly now: Clock = monotonicClock,
  ) {
    this.lastUpdate = now()
  }

  /** Recompute from `samples` if the interval has elapsed since the last pass. */
  update(samples: ArrayLike<number>): void {
    const t = this.now()
    if (t - this.lastUpdate < this.intervalMs) return

    this.stats = computeStats(samples)
    this.lastUpdate = t
  }

  /**
   * Latest snapshot. Each pass replaces the object, so a reference held by
   * the caller keeps the values it was read with.
   */
  getStats(): StatsSnapshot {
    return this.stats
  }

  getAverage(): number {
    return this.stats.average
  }

  getMin(): number {
    return this.stats.min
  }

  getMax(): number {
    return this.stats.max
  }

  get01PercentLow(): number {
    return this.stats.percentile0_1
  }

  get1PercentLow(): number {
    return this.stats.percentile1
  }

  getIntervalMs(): number {
    return this.intervalMs
  }

  /** Zero the snapshot and restart the interval timer. */
  reset(): void {
    this.stats = EMPTY_STATS
    this.lastUpdate = this.now()
  }
}
