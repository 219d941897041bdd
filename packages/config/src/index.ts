// Shared configuration: telemetry settings resolved from overrides, env and defaults.

export {
  resolveTelemetryConfig,
  historySampleCount,
  telemetryConfigSchema,
  ConfigValidationError,
  DEFAULT_TELEMETRY_CONFIG,
  TELEMETRY_CONFIG_KEYS,
  TELEMETRY_ENV_KEYS,
  SAMPLES_PER_SECOND,
  type TelemetryConfig,
  type TelemetryConfigInput,
  type TelemetryConfigKey,
  type EnvSource,
} from './telemetry'
