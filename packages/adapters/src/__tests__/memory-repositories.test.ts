/**
 * In-memory repository tests
 *
 * The memory adapters back the `memory` store driver and every API test, so
 * they must honour the same contracts as the Postgres adapters: ordering,
 * guarded seat reservation and one-way cancellation.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import type { NewShuttle } from '@campus-shuttle/domain';

import {
  FixedClock,
  InMemoryBookingRepository,
  InMemoryRouteRepository,
  InMemoryShuttleRepository,
  InMemoryStopRepository,
  InMemoryStore,
} from '../index.js';

const EPOCH = new Date('2026-03-02T08:00:00.000Z');

let clock: FixedClock;
let store: InMemoryStore;
let seq: number;

beforeEach(() => {
  clock = new FixedClock(EPOCH);
  seq = 0;
  store = new InMemoryStore(
    () => clock.now(),
    () => `id-${++seq}`,
  );
});

function shuttleInput(overrides: Partial<NewShuttle> = {}): NewShuttle {
  return {
    identifier: 'TES-01',
    campus: 'Tesano',
    batteryLevel: 100,
    status: 'idle',
    capacity: 12,
    occupancy: 0,
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Stops & routes
// ═══════════════════════════════════════════════════════════════════════════════

describe('InMemoryStopRepository', () => {
  it('assigns ids and filters by campus, ordered by code', async () => {
    const repo = new InMemoryStopRepository(store);
    await repo.create({ campus: 'Tesano', name: 'Library', code: 'LIB', latitude: 5.6, longitude: -0.2, isActive: true });
    await repo.create({ campus: 'Abokobi', name: 'Gate', code: 'GATE', latitude: 5.7, longitude: -0.2, isActive: true });
    await repo.create({ campus: 'Tesano', name: 'Admin Block', code: 'ADM', latitude: 5.6, longitude: -0.2, isActive: false });

    const tesano = await repo.list({ campus: 'Tesano' });
    expect(tesano.map((s) => s.code)).toEqual(['ADM', 'LIB']);
    expect(tesano[1]?.id).toBe('id-1');
    expect(tesano[1]?.createdAt).toEqual(EPOCH);

    const all = await repo.list();
    expect(all).toHaveLength(3);
  });
});

describe('InMemoryRouteRepository', () => {
  it('copies the stop code list on create', async () => {
    const repo = new InMemoryRouteRepository(store);
    const codes = ['LIB', 'HALL'];
    const route = await repo.create({ campus: 'Tesano', name: 'Loop A', stopCodes: codes, isActive: true });
    codes.push('GATE');

    expect(route.stopCodes).toEqual(['LIB', 'HALL']);
    expect(await repo.list({ campus: 'Abokobi' })).toEqual([]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Shuttles
// ═══════════════════════════════════════════════════════════════════════════════

describe('InMemoryShuttleRepository', () => {
  let repo: InMemoryShuttleRepository;

  beforeEach(() => {
    repo = new InMemoryShuttleRepository(store);
  });

  it('lists by identifier and filters on campus and statuses', async () => {
    await repo.register(shuttleInput({ identifier: 'TES-02' }));
    await repo.register(shuttleInput({ identifier: 'TES-01', status: 'charging' }));
    await repo.register(shuttleInput({ identifier: 'TES-03', status: 'enroute' }));
    await repo.register(shuttleInput({ identifier: 'ABK-01', campus: 'Abokobi' }));

    const tesano = await repo.list({ campus: 'Tesano' });
    expect(tesano.map((s) => s.identifier)).toEqual(['TES-01', 'TES-02', 'TES-03']);

    const bookable = await repo.list({ campus: 'Tesano', statuses: ['idle', 'enroute'] });
    expect(bookable.map((s) => s.identifier)).toEqual(['TES-02', 'TES-03']);

    const charging = await repo.list({ status: 'charging' });
    expect(charging.map((s) => s.identifier)).toEqual(['TES-01']);
  });

  it('reserveSeats increments occupancy and marks the shuttle enroute', async () => {
    const shuttle = await repo.register(shuttleInput());
    clock.advance(60_000);

    const reserved = await repo.reserveSeats({ shuttleId: shuttle.id, seats: 5 });

    expect(reserved?.occupancy).toBe(5);
    expect(reserved?.status).toBe('enroute');
    expect(reserved?.updatedAt).toEqual(new Date('2026-03-02T08:01:00.000Z'));
    expect((await repo.findById(shuttle.id))?.occupancy).toBe(5);
  });

  it('reserveSeats fills a shuttle exactly to capacity', async () => {
    const shuttle = await repo.register(shuttleInput({ capacity: 6, occupancy: 2 }));
    const reserved = await repo.reserveSeats({ shuttleId: shuttle.id, seats: 4 });
    expect(reserved?.occupancy).toBe(6);
  });

  it('reserveSeats refuses overflow and leaves the shuttle untouched', async () => {
    const shuttle = await repo.register(shuttleInput({ occupancy: 5 }));

    expect(await repo.reserveSeats({ shuttleId: shuttle.id, seats: 8 })).toBeNull();

    const after = await repo.findById(shuttle.id);
    expect(after?.occupancy).toBe(5);
    expect(after?.status).toBe('idle');
  });

  it('reserveSeats refuses shuttles that are not bookable', async () => {
    const shuttle = await repo.register(shuttleInput({ status: 'maintenance' }));
    expect(await repo.reserveSeats({ shuttleId: shuttle.id, seats: 1 })).toBeNull();
  });

  it('reserveSeats returns null for an unknown shuttle', async () => {
    expect(await repo.reserveSeats({ shuttleId: 'nope', seats: 1 })).toBeNull();
  });

  it('releaseSeats floors occupancy at zero and keeps status', async () => {
    const shuttle = await repo.register(shuttleInput({ status: 'enroute', occupancy: 2 }));

    const released = await repo.releaseSeats(shuttle.id, 5);

    expect(released?.occupancy).toBe(0);
    expect(released?.status).toBe('enroute');
    expect(await repo.releaseSeats('nope', 1)).toBeNull();
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Bookings
// ═══════════════════════════════════════════════════════════════════════════════

describe('InMemoryBookingRepository', () => {
  let repo: InMemoryBookingRepository;

  beforeEach(() => {
    repo = new InMemoryBookingRepository(store);
  });

  async function book(email: string, campus = 'Tesano') {
    const booking = await repo.create({
      name: 'Rider',
      email,
      campus,
      pickupCode: 'LIB',
      dropoffCode: 'HALL',
      status: 'confirmed',
      etaMinutes: 10,
      seats: 2,
      assignedShuttleId: 'shuttle-1',
      assignedShuttleIdentifier: 'TES-01',
      qrToken: 'token',
    });
    clock.advance(1_000);
    return booking;
  }

  it('lists newest first with email and campus filters', async () => {
    const first = await book('ama@example.edu');
    const second = await book('kofi@example.edu');
    const third = await book('ama@example.edu', 'Abokobi');

    expect((await repo.list()).map((b) => b.id)).toEqual([third.id, second.id, first.id]);
    expect((await repo.list({ email: 'ama@example.edu' })).map((b) => b.id)).toEqual([third.id, first.id]);
    expect((await repo.list({ email: 'ama@example.edu', campus: 'Tesano' })).map((b) => b.id)).toEqual([first.id]);
    expect((await repo.list({ limit: 1, offset: 1 })).map((b) => b.id)).toEqual([second.id]);
  });

  it('markCanceled transitions a confirmed booking once', async () => {
    const booking = await book('ama@example.edu');
    const canceledAt = clock.now();

    const canceled = await repo.markCanceled(booking.id, canceledAt);
    expect(canceled?.status).toBe('canceled');
    expect(canceled?.canceledAt).toEqual(canceledAt);

    expect(await repo.markCanceled(booking.id, canceledAt)).toBeNull();
    expect(await repo.markCanceled('missing', canceledAt)).toBeNull();
  });
});
