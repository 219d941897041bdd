/**
 * Monotonic frame timing.
 *
 * FrameClock yields the duration of each frame in seconds for the rate
 * calculator. Time is read through an injected clock for testability.
 */

import type { Clock } from './types'

/** performance.now(), in milliseconds. */
export const monotonicClock: Clock = () => performance.now()

export class FrameClock {
  private startedAt: number
  private lastAt: number

  constructor(private readonly now: Clock = monotonicClock) {
    this.startedAt = now()
    this.lastAt = this.startedAt
  }

  /** Restart from zero. */
  start(): void {
    this.startedAt = this.now()
    this.lastAt = this.startedAt
  }

  /** Same as start(). */
  reset(): void {
    this.start()
  }

  /** Seconds since the previous call (or start). Moves the mark. */
  deltaTime(): number {
    const t = this.now()
    const delta = (t - this.lastAt) / 1000
    this.lastAt = t
    return delta
  }

  /** Seconds since start. Does not move the mark. */
  elapsed(): number {
    return (this.now() - this.startedAt) / 1000
  }
}
