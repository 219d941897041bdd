// Frame-rate telemetry: sample store, rate, statistics and drop detection.

export type {
  Clock,
  StatsSnapshot,
  DropEvent,
  DropCallback,
  TelemetrySnapshot,
} from './types'

export {
  SampleStoreError,
  SampleIndexError,
  EmptySampleStoreError,
} from './errors'

export { SampleStore } from './sample-store'

export {
  DEFAULT_HISTORY_SIZE,
  MAX_HISTORY_SIZE,
  MAX_RATE,
  RateCalculator,
} from './rate-calculator'

export {
  DEFAULT_STATS_INTERVAL_MS,
  PERCENTILE_0_1,
  PERCENTILE_1,
  EMPTY_STATS,
  percentile,
  computeStats,
  StatsAggregator,
} from './stats-aggregator'

export {
  DEFAULT_DROP_THRESHOLD_PERCENT,
  MIN_DROP_THRESHOLD_PERCENT,
  MAX_DROP_THRESHOLD_PERCENT,
  DROP_DEBOUNCE_MS,
  MAX_DROP_HISTORY,
  MIN_BASELINE_RATE,
  DropDetector,
  combineDropCallbacks,
} from './drop-detector'

export { monotonicClock, FrameClock } from './clock'

export {
  logEvent,
  createDropLogger,
  stdoutSink,
  type LogSink,
  type LogLevel,
} from './logger'

export { TelemetrySession, type TelemetrySessionOptions } from './session'
