import { z } from 'zod'

/** Assumed frame rate used to turn a history duration into a sample count. */
export const SAMPLES_PER_SECOND = 60

export const telemetryConfigSchema = z.object({
  historySeconds: z.number().finite().positive('History must be longer than zero seconds').default(2),
  dropThresholdPercent: z.number().finite().default(15),
  statsUpdateMs: z.number().int().min(0).default(500),
})

export type TelemetryConfig = z.infer<typeof telemetryConfigSchema>
export type TelemetryConfigInput = z.input<typeof telemetryConfigSchema>
export type TelemetryConfigKey = keyof TelemetryConfig

/** All setting keys for iteration. */
export const TELEMETRY_CONFIG_KEYS: TelemetryConfigKey[] = [
  'historySeconds',
  'dropThresholdPercent',
  'statsUpdateMs',
]

/** Environment variable read for each setting. */
export const TELEMETRY_ENV_KEYS: Record<TelemetryConfigKey, string> = {
  historySeconds: 'FRAMEPULSE_HISTORY_SECONDS',
  dropThresholdPercent: 'FRAMEPULSE_DROP_THRESHOLD_PERCENT',
  statsUpdateMs: 'FRAMEPULSE_STATS_UPDATE_MS',
}

export const DEFAULT_TELEMETRY_CONFIG: TelemetryConfig = telemetryConfigSchema.parse({})

export type EnvSource = Readonly<Record<string, string | undefined>>

/** Thrown when resolved settings fail validation. */
export class ConfigValidationError extends Error {
  constructor(public readonly fields: Partial<Record<TelemetryConfigKey, string[]>>) {
    const summary = Object.entries(fields)
      .map(([key, messages]) => `${key}: ${(messages ?? []).join(', ')}`)
      .join('; ')
    super(`Invalid telemetry configuration (${summary})`)
    this.name = 'ConfigValidationError'
  }
}

function processEnv(): EnvSource {
  if (typeof process !== 'undefined' && process.env) return process.env
  return {}
}

// Blank means unset. Anything else is handed to the schema as a number, so
// "abc" surfaces as a validation failure instead of silently using the default.
function readEnvNumber(env: EnvSource, key: string): number | undefined {
  const val = env[key]?.trim()
  if (val === undefined || val === '') return undefined
  return Number(val)
}

/**
 * Resolve settings: explicit override > environment > default.
 *
 * @throws ConfigValidationError if any resolved value is invalid
 */
export function resolveTelemetryConfig(
  overrides: TelemetryConfigInput = {},
  env: EnvSource = processEnv(),
): TelemetryConfig {
  const fromEnv: TelemetryConfigInput = {}
  for (const key of TELEMETRY_CONFIG_KEYS) {
    const value = readEnvNumber(env, TELEMETRY_ENV_KEYS[key])
    if (value !== undefined) fromEnv[key] = value
  }

  const result = telemetryConfigSchema.safeParse({ ...fromEnv, ...stripUndefined(overrides) })
  if (!result.success) {
    throw new ConfigValidationError(result.error.flatten().fieldErrors)
  }
  return result.data
}

/** Number of rate samples covering `historySeconds` at the assumed frame rate. */
export function historySampleCount(config: Pick<TelemetryConfig, 'historySeconds'>): number {
  return Math.floor(config.historySeconds * SAMPLES_PER_SECOND)
}

function stripUndefined(input: TelemetryConfigInput): TelemetryConfigInput {
  const out: TelemetryConfigInput = {}
  for (const key of TELEMETRY_CONFIG_KEYS) {
    const value = input[key]
    if (value !== undefined) out[key] = value
  }
  return out
}
