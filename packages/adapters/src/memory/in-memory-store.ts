import { randomUUID } from 'node:crypto';
import type {
  Booking,
  Route,
  Shuttle,
  Stop,
  StoreHealthPort,
} from '@campus-shuttle/domain';

/**
 * Process-local tables backing the in-memory repositories. Every mutation
 * runs synchronously between awaits, so each repository call is atomic with
 * respect to other calls in the same process.
 */
export class InMemoryStore implements StoreHealthPort {
  readonly driver = 'memory';

  readonly stops = new Map<string, Stop>();
  readonly routes = new Map<string, Route>();
  readonly shuttles = new Map<string, Shuttle>();
  readonly bookings = new Map<string, Booking>();

  constructor(
    readonly now: () => Date = () => new Date(),
    readonly nextId: () => string = randomUUID,
  ) {}

  async ping(): Promise<void> {}
}
