/** Message rejected before any hit is enqueued (bad protocol version, no device id). */
export class ValidationError extends Error {
  override readonly name = 'ValidationError';
}

/** The queue could not take a record before the caller gave up. */
export class CapacityError extends Error {
  override readonly name = 'CapacityError';
}

/** A store failed to write, read or compact records. */
export class PersistenceError extends Error {
  override readonly name = 'PersistenceError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}
