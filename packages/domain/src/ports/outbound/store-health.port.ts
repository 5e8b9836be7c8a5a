export interface StoreHealthPort {
  /** Short label for health output, e.g. "postgres". */
  readonly driver: string;
  /** Rejects when the store cannot serve queries. */
  ping(): Promise<void>;
}
