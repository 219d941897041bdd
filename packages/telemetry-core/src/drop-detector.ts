/**
 * Frame-rate drop detection against the rolling average.
 *
 * `checkForDrop` is a pure predicate that holds on every qualifying frame.
 * `update` records at most one drop per debounce interval, so a sustained
 * stutter produces one event rather than one per frame.
 */

import { monotonicClock } from './clock'
import type { Clock, DropCallback, DropEvent } from './types'

// ─── Constants ───────────────────────────────────────────────────────────────

export const DEFAULT_DROP_THRESHOLD_PERCENT = 15
export const MIN_DROP_THRESHOLD_PERCENT = 5
export const MAX_DROP_THRESHOLD_PERCENT = 50

/** Minimum spacing between recorded drops (ms) */
export const DROP_DEBOUNCE_MS = 500

/** Drops kept in history; the oldest is evicted beyond this */
export const MAX_DROP_HISTORY = 100

/** Below this average rate no drop is ever reported */
export const MIN_BASELINE_RATE = 10

function clampThreshold(percent: number): number {
  if (Number.isNaN(percent)) return DEFAULT_DROP_THRESHOLD_PERCENT
  return Math.max(MIN_DROP_THRESHOLD_PERCENT, Math.min(percent, MAX_DROP_THRESHOLD_PERCENT))
}

// ─── Detector ────────────────────────────────────────────────────────────────

export class DropDetector {
  private thresholdPercent: number
  private readonly drops: DropEvent[] = []
  private callback: DropCallback | undefined
  private lastDropAt: number

  /** @param thresholdPercent clamped to [5, 50] */
  constructor(
    thresholdPercent = DEFAULT_DROP_THRESHOLD_PERCENT,
    private readonly now: Clock = monotonicClock,
  ) {
    this.thresholdPercent = clampThreshold(thresholdPercent)
    // The debounce window starts at construction, so warm-up frames are not reported.
    this.lastDropAt = now()
  }

  /**
   * Evaluate one frame. Records a drop and notifies the callback when the
   * predicate holds and the debounce interval has passed. An error thrown by
   * the callback propagates after the drop is recorded.
   */
  update(currentRate: number, averageRate: number): void {
    if (!this.checkForDrop(currentRate, averageRate)) return

    const t = this.now()
    if (t - this.lastDropAt < DROP_DEBOUNCE_MS) return

    const drop: DropEvent = {
      timestamp: t,
      averageRate,
      currentRate,
      magnitude: (averageRate - currentRate) / averageRate,
    }
    this.drops.push(drop)
    this.lastDropAt = t
    if (this.drops.length > MAX_DROP_HISTORY) this.drops.shift()

    this.callback?.(drop)
  }

  /** True if `currentRate` is at least `thresholdPercent` below `averageRate`. */
  checkForDrop(currentRate: number, averageRate: number): boolean {
    if (averageRate < MIN_BASELINE_RATE) return false
    const dropPercent = ((averageRate - currentRate) / averageRate) * 100
    return dropPercent >= this.thresholdPercent
  }

  /** All recorded drops, oldest to newest. */
  getDrops(): DropEvent[] {
    return [...this.drops]
  }

  /** Drops recorded within the last `seconds`, oldest to newest. */
  getRecentDrops(seconds: number): DropEvent[] {
    const t = this.now()
    const windowMs = seconds * 1000
    return this.drops.filter(d => t - d.timestamp <= windowMs)
  }

  /** Out-of-range values are clamped into [5, 50], not rejected. */
  setThreshold(percent: number): void {
    this.thresholdPercent = clampThreshold(percent)
  }

  getThreshold(): number {
    return this.thresholdPercent
  }

  /** Replace the callback. Pass undefined to unregister. */
  setDropCallback(callback: DropCallback | undefined): void {
    this.callback = callback
  }

  /** Empty the history. Threshold and debounce state are kept. */
  clearHistory(): void {
    this.drops.length = 0
  }
}

// ─── Fan-out ─────────────────────────────────────────────────────────────────

/**
 * Wrap several observers into one callback for the detector's single slot.
 * Observers run in order; the first one to throw stops the rest.
 */
export function combineDropCallbacks(...callbacks: DropCallback[]): DropCallback {
  return (drop) => {
    for (const cb of callbacks) cb(drop)
  }
}
