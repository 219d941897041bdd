import { describe, it, expect } from 'vitest'

import {
  StatsAggregator,
  percentile,
  computeStats,
  EMPTY_STATS,
  DEFAULT_STATS_INTERVAL_MS,
} from '../stats-aggregator'

// ─── percentile ──────────────────────────────────────────────────────────────

describe('percentile', () => {
  const five = [10, 20, 30, 40, 50]

  it('returns the extremes at 0 and 1', () => {
    expect(percentile(five, 0)).toBe(10)
    expect(percentile(five, 1)).toBe(50)
  })

  it('returns an exact rank without interpolation', () => {
    expect(percentile(five, 0.5)).toBe(30)
  })

  it('interpolates between ranks', () => {
    expect(percentile([10, 20], 0.5)).toBe(15)
    expect(percentile(five, 0.125)).toBe(15) // idx 0.5
  })

  it('handles empty and single-element input', () => {
    expect(percentile([], 0.01)).toBe(0)
    expect(percentile([7], 0)).toBe(7)
    expect(percentile([7], 0.999)).toBe(7)
  })

  it('computes 1% and 0.1% lows over 1..1000', () => {
    const sorted = Array.from({ length: 1000 }, (_, i) => i + 1)
    expect(percentile(sorted, 0.01)).toBeCloseTo(10.99, 9)
    expect(percentile(sorted, 0.001)).toBeCloseTo(1.999, 9)
  })
})

// ─── computeStats ────────────────────────────────────────────────────────────

describe('computeStats', () => {
  it('is all zero for no samples', () => {
    expect(computeStats([])).toEqual(EMPTY_STATS)
    expect(EMPTY_STATS).toEqual({ average: 0, min: 0, max: 0, percentile0_1: 0, percentile1: 0 })
  })

  it('sets every field to a lone sample', () => {
    expect(computeStats([42])).toEqual({
      average: 42, min: 42, max: 42, percentile0_1: 42, percentile1: 42,
    })
  })

  it('sorts a copy and leaves the input alone', () => {
    const input = [30, 10, 20]
    const stats = computeStats(input)
    expect(input).toEqual([30, 10, 20])
    expect(stats.min).toBe(10)
    expect(stats.max).toBe(30)
    expect(stats.average).toBe(20)
    expect(stats.percentile0_1).toBeCloseTo(10.02, 10)
    expect(stats.percentile1).toBeCloseTo(10.2, 10)
  })
})

// ─── StatsAggregator ─────────────────────────────────────────────────────────

describe('StatsAggregator', () => {
  it('uses a 500 ms default interval', () => {
    expect(DEFAULT_STATS_INTERVAL_MS).toBe(500)
    expect(new StatsAggregator().getIntervalMs()).toBe(500)
  })

  it('skips updates until the interval elapses', () => {
    let time = 0
    const agg = new StatsAggregator(500, () => time)

    agg.update([30, 10, 20])
    expect(agg.getStats()).toEqual(EMPTY_STATS)

    time = 499
    agg.update([30, 10, 20])
    expect(agg.getStats()).toEqual(EMPTY_STATS)

    time = 500
    agg.update([30, 10, 20])
    expect(agg.getMin()).toBe(10)
    expect(agg.getMax()).toBe(30)
    expect(agg.getAverage()).toBe(20)
    expect(agg.get01PercentLow()).toBeCloseTo(10.02, 10)
    expect(agg.get1PercentLow()).toBeCloseTo(10.2, 10)
  })

  it('keeps the stale snapshot between passes', () => {
    let time = 500
    const timed = new StatsAggregator(500, () => time)
    time = 1000
    timed.update([60])

    time = 1200
    timed.update([1])
    expect(timed.getAverage()).toBe(60)

    time = 1500
    timed.update([1])
    expect(timed.getAverage()).toBe(1)
  })

  it('returns a new snapshot object per pass', () => {
    let time = 0
    const agg = new StatsAggregator(0, () => time)
    agg.update([10])
    const held = agg.getStats()
    time = 1
    agg.update([20])
    expect(held.average).toBe(10)
    expect(agg.getStats().average).toBe(20)
  })

  it('recomputes every call with a zero interval', () => {
    const agg = new StatsAggregator(0, () => 0)
    agg.update([1, 2, 3])
    expect(agg.getAverage()).toBe(2)
    agg.update([])
    expect(agg.getStats()).toEqual(EMPTY_STATS)
  })

  it('reset zeroes the snapshot and restarts the interval', () => {
    let time = 0
    const agg = new StatsAggregator(500, () => time)
    time = 500
    agg.update([10, 20])
    expect(agg.getAverage()).toBe(15)

    time = 1000
    agg.reset()
    agg.reset()
    expect(agg.getStats()).toEqual(EMPTY_STATS)

    time = 1400
    agg.update([10, 20])
    expect(agg.getStats()).toEqual(EMPTY_STATS)

    time = 1500
    agg.update([10, 20])
    expect(agg.getAverage()).toBe(15)
  })
})
