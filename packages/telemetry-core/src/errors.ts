/** Base error for sample store misuse, also thrown for an invalid capacity. */
export class SampleStoreError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SampleStoreError'
  }
}

/** Index outside [0, size). */
export class SampleIndexError extends SampleStoreError {
  constructor(
    public readonly index: number,
    public readonly size: number,
  ) {
    super(`Sample index ${index} out of range for store of size ${size}`)
    this.name = 'SampleIndexError'
  }
}

/** Read of the newest sample from an empty store. */
export class EmptySampleStoreError extends SampleStoreError {
  constructor() {
    super('Sample store is empty')
    this.name = 'EmptySampleStoreError'
  }
}
