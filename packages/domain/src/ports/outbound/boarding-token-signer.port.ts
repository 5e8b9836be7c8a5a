export interface BoardingClaims {
  shuttleIdentifier: string;
  email: string;
  issuedAt: Date;
}

export interface BoardingTokenSignerPort {
  sign(claims: BoardingClaims): string;
}
