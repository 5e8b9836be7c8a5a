export interface Stop {
  readonly id: string;
  readonly campus: string;      // e.g. "Tesano", "Abokobi"
  readonly name: string;        // e.g. "Library", "Lecture Block A"
  readonly code: string;        // short code riders book against, e.g. "LIB"
  readonly latitude: number;
  readonly longitude: number;
  readonly isActive: boolean;
  readonly createdAt: Date;
}
