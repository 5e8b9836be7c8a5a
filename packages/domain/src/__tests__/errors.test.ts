import { describe, it, expect } from '@jest/globals';

import { BookingError, StoreUnavailableError } from '../index.js';
import type { BookingErrorCode } from '../index.js';

describe('BookingError', () => {
  const cases: Array<[BookingErrorCode, number]> = [
    ['INVALID_REQUEST', 400],
    ['NO_AVAILABILITY', 409],
    ['CAPACITY_EXCEEDED', 409],
    ['NOT_FOUND', 404],
    ['WINDOW_CLOSED', 400],
  ];

  it.each(cases)('%s maps to HTTP %i', (code, status) => {
    const err = new BookingError(code, 'rejected');
    expect(err.code).toBe(code);
    expect(err.status).toBe(status);
    expect(err.message).toBe('rejected');
    expect(err).toBeInstanceOf(Error);
  });

  it('keeps details for the response body', () => {
    const err = new BookingError('NOT_FOUND', 'Booking not found', { bookingId: 'b-1' });
    expect(err.details).toEqual({ bookingId: 'b-1' });
  });
});

describe('StoreUnavailableError', () => {
  it('is a 503 distinct from business rejections', () => {
    const cause = new Error('connect ECONNREFUSED');
    const err = new StoreUnavailableError('store query failed', { cause });
    expect(err.status).toBe(503);
    expect(err.code).toBe('STORE_UNAVAILABLE');
    expect(err.cause).toBe(cause);
    expect(err).not.toBeInstanceOf(BookingError);
  });
});
