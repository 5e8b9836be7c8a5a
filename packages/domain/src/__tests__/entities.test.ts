/**
 * Domain entity helper tests
 *
 * Entities are plain interfaces; these tests cover the small pure helpers
 * that live beside them (bookable statuses, cutoff time).
 */

import { describe, it, expect } from '@jest/globals';

import {
  BOOKABLE_SHUTTLE_STATUSES,
  CANCELLATION_CUTOFF_MINUTES,
  cancellationCutoff,
  isBookableStatus,
} from '../index.js';
import type { Booking } from '../index.js';

// ─── Factory helpers ──────────────────────────────────────────────────────────

const NOW = new Date('2026-03-02T08:00:00.000Z');

function makeBooking(overrides: Partial<Booking> = {}): Booking {
  return {
    id: 'booking-01',
    name: 'Ama Mensah',
    email: 'ama@example.edu',
    campus: 'Tesano',
    pickupCode: 'LIB',
    dropoffCode: 'HALL',
    status: 'confirmed',
    etaMinutes: 10,
    seats: 1,
    createdAt: NOW,
    updatedAt: NOW,
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Shuttle
// ═══════════════════════════════════════════════════════════════════════════════

describe('isBookableStatus', () => {
  it('accepts idle and enroute', () => {
    expect(BOOKABLE_SHUTTLE_STATUSES).toEqual(['idle', 'enroute']);
    expect(isBookableStatus('idle')).toBe(true);
    expect(isBookableStatus('enroute')).toBe(true);
  });

  it('rejects charging, maintenance and unknown statuses', () => {
    expect(isBookableStatus('charging')).toBe(false);
    expect(isBookableStatus('maintenance')).toBe(false);
    expect(isBookableStatus('parked')).toBe(false);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Booking
// ═══════════════════════════════════════════════════════════════════════════════

describe('cancellationCutoff', () => {
  it('is null for ASAP bookings', () => {
    expect(cancellationCutoff(makeBooking())).toBeNull();
  });

  it('is five minutes before the scheduled time', () => {
    expect(CANCELLATION_CUTOFF_MINUTES).toBe(5);
    const booking = makeBooking({ scheduledTime: new Date('2026-03-02T09:00:00.000Z') });
    expect(cancellationCutoff(booking)?.toISOString()).toBe('2026-03-02T08:55:00.000Z');
  });
});
