import { createHmac } from 'node:crypto';
import type { BoardingClaims, BoardingTokenSignerPort } from '@campus-shuttle/domain';

/**
 * Signs boarding claims with HMAC-SHA-256 and encodes the digest as
 * unpadded base64url (43 chars), short enough for a QR code.
 *
 * The message is `identifier:email:issuedAt` with issuedAt in ISO-8601, so
 * two bookings for the same rider and shuttle get different tokens. A gate
 * holding the same secret recomputes the digest to check a token.
 */
export class HmacBoardingTokenSigner implements BoardingTokenSignerPort {
  constructor(private readonly secret: string) {
    if (secret.length === 0) {
      throw new Error('boarding token secret must not be empty');
    }
  }

  sign(claims: BoardingClaims): string {
    return createHmac('sha256', this.secret)
      .update(boardingMessage(claims))
      .digest('base64url');
  }
}

export function boardingMessage(claims: BoardingClaims): string {
  return `${claims.shuttleIdentifier}:${claims.email}:${claims.issuedAt.toISOString()}`;
}
