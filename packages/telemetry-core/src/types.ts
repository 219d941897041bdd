/**
 * Types for frame-rate telemetry.
 *
 * Rates are frames per second. Timestamps are milliseconds on the monotonic
 * clock the component was built with (performance.now by default).
 */

// ─── Time ────────────────────────────────────────────────────────────────────

/** Monotonic time source in milliseconds. */
export type Clock = () => number

// ─── Statistics ──────────────────────────────────────────────────────────────

export interface StatsSnapshot {
  /** Arithmetic mean of the samples */
  readonly average: number
  readonly min: number
  readonly max: number
  /** 0.1% low */
  readonly percentile0_1: number
  /** 1% low */
  readonly percentile1: number
}

// ─── Drops ───────────────────────────────────────────────────────────────────

export interface DropEvent {
  /** When the drop was recorded (ms, detector clock) */
  readonly timestamp: number
  /** Rolling average rate at detection */
  readonly averageRate: number
  /** Instantaneous rate at detection */
  readonly currentRate: number
  /** (average - current) / average, in (0, 1] */
  readonly magnitude: number
}

export type DropCallback = (drop: DropEvent) => void

// ─── Export ──────────────────────────────────────────────────────────────────

export interface TelemetrySnapshot {
  readonly capturedAt: string
  /** Sample store capacity */
  readonly capacity: number
  readonly sampleCount: number
  readonly currentRate: number
  readonly averageRate: number
  readonly thresholdPercent: number
  readonly stats: StatsSnapshot
  readonly drops: readonly DropEvent[]
}
