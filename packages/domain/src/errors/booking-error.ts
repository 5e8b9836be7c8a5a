export type BookingErrorCode =
  | 'INVALID_REQUEST'
  | 'NO_AVAILABILITY'
  | 'CAPACITY_EXCEEDED'
  | 'NOT_FOUND'
  | 'WINDOW_CLOSED';

const STATUS_BY_CODE: Record<BookingErrorCode, number> = {
  INVALID_REQUEST: 400,
  NO_AVAILABILITY: 409,
  CAPACITY_EXCEEDED: 409,
  NOT_FOUND: 404,
  WINDOW_CLOSED: 400,
};

/**
 * Business-rule rejection. Raised before any state is mutated, so the
 * caller can surface it as-is; retrying with the same input is pointless.
 */
export class BookingError extends Error {
  readonly status: number;

  constructor(
    readonly code: BookingErrorCode,
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'BookingError';
    this.status = STATUS_BY_CODE[code];
  }
}

/** Persistence-layer fault (store unreachable, query failed). */
export class StoreUnavailableError extends Error {
  readonly code = 'STORE_UNAVAILABLE';
  readonly status = 503;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreUnavailableError';
  }
}
