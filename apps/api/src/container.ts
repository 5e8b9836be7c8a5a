import type {
  BookingCommandPort,
  BookingRepositoryPort,
  ClockPort,
  RouteRepositoryPort,
  ShuttleRepositoryPort,
  StopRepositoryPort,
  StoreHealthPort,
} from '@campus-shuttle/domain';
import {
  HmacBoardingTokenSigner,
  InMemoryBookingRepository,
  InMemoryRouteRepository,
  InMemoryShuttleRepository,
  InMemoryStopRepository,
  InMemoryStore,
  PgBookingRepository,
  PgRouteRepository,
  PgShuttleRepository,
  PgStopRepository,
  PgStoreHealth,
  SystemClock,
  type Queryable,
} from '@campus-shuttle/adapters';
import { BookingAllocator } from './services/booking/booking-allocator.js';

/** Everything the HTTP layer needs, wired against one store. */
export interface ApiDependencies {
  stops: StopRepositoryPort;
  routes: RouteRepositoryPort;
  shuttles: ShuttleRepositoryPort;
  bookings: BookingRepositoryPort;
  allocator: BookingCommandPort;
  storeHealth: StoreHealthPort;
}

export interface WiringOptions {
  boardingTokenSecret: string;
  clock?: ClockPort;
}

export function createPostgresDependencies(db: Queryable, opts: WiringOptions): ApiDependencies {
  const shuttles = new PgShuttleRepository(db);
  const bookings = new PgBookingRepository(db);
  return {
    stops: new PgStopRepository(db),
    routes: new PgRouteRepository(db),
    shuttles,
    bookings,
    allocator: new BookingAllocator({
      shuttles,
      bookings,
      signer: new HmacBoardingTokenSigner(opts.boardingTokenSecret),
      clock: opts.clock ?? new SystemClock(),
    }),
    storeHealth: new PgStoreHealth(db),
  };
}

export function createMemoryDependencies(
  opts: WiringOptions,
  existing?: InMemoryStore,
): ApiDependencies {
  const clock = opts.clock ?? new SystemClock();
  const store = existing ?? new InMemoryStore(() => clock.now());
  const shuttles = new InMemoryShuttleRepository(store);
  const bookings = new InMemoryBookingRepository(store);
  return {
    stops: new InMemoryStopRepository(store),
    routes: new InMemoryRouteRepository(store),
    shuttles,
    bookings,
    allocator: new BookingAllocator({
      shuttles,
      bookings,
      signer: new HmacBoardingTokenSigner(opts.boardingTokenSecret),
      clock,
    }),
    storeHealth: store,
  };
}
