/**
 * Telemetry session: one rate calculator, stats aggregator and drop detector
 * fed together once per frame, plus a JSON-exportable snapshot for the
 * presentation layer.
 */

import {
  DEFAULT_TELEMETRY_CONFIG,
  historySampleCount,
  type TelemetryConfig,
} from '@framepulse/config'

import { FrameClock, monotonicClock } from './clock'
import { DropDetector } from './drop-detector'
import { createDropLogger, logEvent, stdoutSink, type LogSink } from './logger'
import { RateCalculator } from './rate-calculator'
import { StatsAggregator } from './stats-aggregator'
import type { Clock, TelemetrySnapshot } from './types'

export interface TelemetrySessionOptions {
  config?: TelemetryConfig
  /** Monotonic time source shared by every component (ms) */
  now?: Clock
  /** Where session and drop log lines go. Defaults to stdout. */
  logSink?: LogSink
  /** Register a drop logger as the detector callback. Default true. */
  logDrops?: boolean
}

export class TelemetrySession {
  readonly rate: RateCalculator
  readonly stats: StatsAggregator
  readonly drops: DropDetector
  readonly clock: FrameClock
  private readonly logSink: LogSink

  constructor(options: TelemetrySessionOptions = {}) {
    const config = options.config ?? DEFAULT_TELEMETRY_CONFIG
    const now = options.now ?? monotonicClock
    this.logSink = options.logSink ?? stdoutSink

    this.rate = new RateCalculator(historySampleCount(config))
    this.stats = new StatsAggregator(config.statsUpdateMs, now)
    this.drops = new DropDetector(config.dropThresholdPercent, now)
    this.clock = new FrameClock(now)

    if (options.logDrops ?? true) {
      this.drops.setDropCallback(createDropLogger(this.logSink))
    }
  }

  // ── Per-frame ingestion ──

  /** Feed one frame duration (seconds) through rate, stats and drop detection. */
  update(deltaTimeSeconds: number): void {
    this.rate.update(deltaTimeSeconds)
    this.stats.update(this.rate.getSamples())
    this.drops.update(this.rate.getCurrentRate(), this.rate.getAverageRate())
  }

  /** Measure the frame on the session clock and feed it. Returns the delta in seconds. */
  frame(): number {
    const delta = this.clock.deltaTime()
    this.update(delta)
    return delta
  }

  // ── Export ──

  snapshot(): TelemetrySnapshot {
    return {
      capturedAt: new Date().toISOString(),
      capacity: this.rate.getCapacity(),
      sampleCount: this.rate.getSampleCount(),
      currentRate: this.rate.getCurrentRate(),
      averageRate: this.rate.getAverageRate(),
      thresholdPercent: this.drops.getThreshold(),
      stats: this.stats.getStats(),
      drops: this.drops.getDrops(),
    }
  }

  exportJSON(): string {
    return JSON.stringify(this.snapshot(), null, 2)
  }

  /** Clear samples, stats and drop history, and restart the frame clock. */
  reset(): void {
    this.rate.reset()
    this.stats.reset()
    this.drops.clearHistory()
    this.clock.reset()
    logEvent('session_reset', {}, this.logSink)
  }
}
