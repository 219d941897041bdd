/**
 * Fixed-capacity circular store of rate samples.
 *
 * Storage is a Float64Array allocated once; push never allocates. When full,
 * the oldest sample is overwritten. Every method runs to completion
 * synchronously, so a single call always sees a consistent state; callers
 * that need a stable view across calls take `allInOrder()`.
 */

import { EmptySampleStoreError, SampleIndexError, SampleStoreError } from './errors'

export class SampleStore {
  private readonly buffer: Float64Array
  private readonly _capacity: number
  private head = 0
  private _size = 0

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new SampleStoreError(`Sample store capacity must be a positive integer, got ${capacity}`)
    }
    this._capacity = capacity
    this.buffer = new Float64Array(capacity)
  }

  /** Push a new sample. Overwrites oldest if at capacity. */
  push(value: number): void {
    this.buffer[this.head] = value
    this.head = (this.head + 1) % this._capacity
    if (this._size < this._capacity) this._size++
  }

  /**
   * Get the sample at index (0 = oldest).
   *
   * @throws SampleIndexError if index is not an integer in [0, size)
   */
  get(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this._size) {
      throw new SampleIndexError(index, this._size)
    }
    return this.buffer[this.slot(index)]!
  }

  /**
   * Get the most recent sample.
   *
   * @throws EmptySampleStoreError if nothing has been pushed since the last clear
   */
  latest(): number {
    if (this._size === 0) throw new EmptySampleStoreError()
    return this.buffer[(this.head - 1 + this._capacity) % this._capacity]!
  }

  /** Copy of all samples, oldest to newest. */
  allInOrder(): number[] {
    const out = new Array<number>(this._size)
    for (let i = 0; i < this._size; i++) {
      out[i] = this.buffer[this.slot(i)]!
    }
    return out
  }

  /** Sum of the live samples. */
  sum(): number {
    let total = 0
    for (let i = 0; i < this._size; i++) {
      total += this.buffer[this.slot(i)]!
    }
    return total
  }

  size(): number {
    return this._size
  }

  capacity(): number {
    return this._capacity
  }

  isFull(): boolean {
    return this._size === this._capacity
  }

  isEmpty(): boolean {
    return this._size === 0
  }

  /** Logically empty the store. Old values stay in memory until overwritten. */
  clear(): void {
    this.head = 0
    this._size = 0
  }

  private slot(index: number): number {
    return (this.head - this._size + index + this._capacity) % this._capacity
  }
}
