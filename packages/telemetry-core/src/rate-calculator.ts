/**
 * Instantaneous and rolling frame rate from per-frame durations.
 */

import { SampleStore } from './sample-store'

// ─── Constants ───────────────────────────────────────────────────────────────

/** Default rolling window (samples): two seconds at 60fps */
export const DEFAULT_HISTORY_SIZE = 120

/** Hard cap on stored samples: ten seconds at 60fps */
export const MAX_HISTORY_SIZE = 600

/** Instantaneous rates are clamped to [0, MAX_RATE] */
export const MAX_RATE = 1000

// ─── Calculator ──────────────────────────────────────────────────────────────

export class RateCalculator {
  private readonly samples: SampleStore
  private currentRate = 0
  private averageRate = 0

  /**
   * @param historySize window length in samples, clamped to [1, MAX_HISTORY_SIZE].
   * NaN falls back to DEFAULT_HISTORY_SIZE.
   */
  constructor(historySize = DEFAULT_HISTORY_SIZE) {
    const size = Number.isNaN(historySize) ? DEFAULT_HISTORY_SIZE : Math.floor(historySize)
    this.samples = new SampleStore(Math.max(1, Math.min(size, MAX_HISTORY_SIZE)))
  }

  /**
   * Feed one frame duration in seconds.
   * Non-positive (or NaN) durations are ignored and leave both rates untouched.
   */
  update(deltaTime: number): void {
    if (!(deltaTime > 0)) return

    this.currentRate = Math.max(0, Math.min(1 / deltaTime, MAX_RATE))
    this.samples.push(this.currentRate)
    // Mean over every stored sample, recomputed from scratch (no running sum)
    this.averageRate = this.samples.sum() / this.samples.size()
  }

  getCurrentRate(): number {
    return this.currentRate
  }

  getAverageRate(): number {
    return this.averageRate
  }

  /** Stored rates, oldest to newest. */
  getSamples(): number[] {
    return this.samples.allInOrder()
  }

  getSampleCount(): number {
    return this.samples.size()
  }

  getCapacity(): number {
    return this.samples.capacity()
  }

  reset(): void {
    this.samples.clear()
    this.currentRate = 0
    this.averageRate = 0
  }
}
