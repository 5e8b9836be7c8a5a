export interface Route {
  readonly id: string;
  readonly campus: string;      // campus name or 'Inter-Campus'
  readonly name: string;
  /** Ordered stop codes; not checked against registered stops. */
  readonly stopCodes: string[];
  readonly isActive: boolean;
  readonly createdAt: Date;
}
