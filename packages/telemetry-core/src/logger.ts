/**
 * Structured logging: one JSON line per event.
 *
 * Lines are `{ ts, level, event, ...fields }` and go to stdout unless a sink
 * is given.
 */

import type { DropCallback } from './types'

export type LogSink = (line: string) => void
export type LogLevel = 'info' | 'warn' | 'error'

export const stdoutSink: LogSink = (line) => {
  process.stdout.write(line)
}

export function logEvent(
  event: string,
  fields: Record<string, unknown> = {},
  sink: LogSink = stdoutSink,
  level: LogLevel = 'info',
): void {
  sink(JSON.stringify({ ts: new Date().toISOString(), level, event, ...fields }) + '\n')
}

/** Drop callback that logs a `frame_drop` warning per recorded drop. */
export function createDropLogger(sink: LogSink = stdoutSink): DropCallback {
  return (drop) => {
    logEvent('frame_drop', {
      magnitudePercent: Number((drop.magnitude * 100).toFixed(1)),
      currentRate: Number(drop.currentRate.toFixed(1)),
      averageRate: Number(drop.averageRate.toFixed(1)),
    }, sink, 'warn')
  }
}
