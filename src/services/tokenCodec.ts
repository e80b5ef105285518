import { sign, verify } from 'jsonwebtoken';
import { z } from 'zod';
import { Clock, Principal } from '../types/gateway.js';

const ALGORITHM = 'HS384';

const claimsSchema = z.object({
  id: z.string().uuid(),
  name: z.string(),
  valid_since: z.number().int().nonnegative(),
  valid_until: z.number().int().nonnegative(),
  superuser: z.boolean().default(false),
});

export const ANONYMOUS_PRINCIPAL: Principal = Object.freeze({
  id: '00000000-0000-0000-0000-000000000000',
  name: 'Anonymous',
  validSince: 0,
  validUntil: Number.MAX_SAFE_INTEGER,
  isSuperuser: false,
});

/**
 * Signs principals into compact HS384 tokens and verifies them again.
 * Verification needs nothing but the token, the secret and the clock.
 */
export class TokenCodec {
  constructor(
    private readonly secret: string,
    private readonly clock: Clock = Date.now,
  ) {}

  sign(principal: Principal): string {
    return sign(
      {
        id: principal.id,
        name: principal.name,
        valid_since: principal.validSince,
        valid_until: principal.validUntil,
        superuser: principal.isSuperuser,
      },
      this.secret,
      { algorithm: ALGORITHM, noTimestamp: true },
    );
  }

  /**
   * Returns the principal when the signature checks out and the current time
   * lies inside its validity window, `null` otherwise.
   */
  verify(token: string): Principal | null {
    let payload: unknown;
    try {
      payload = verify(token, this.secret, { algorithms: [ALGORITHM] });
    } catch {
      return null;
    }

    const claims = claimsSchema.safeParse(payload);
    if (!claims.success) return null;

    const now = this.clock();
    if (claims.data.valid_since > now || claims.data.valid_until < now) return null;

    return {
      id: claims.data.id,
      name: claims.data.name,
      validSince: claims.data.valid_since,
      validUntil: claims.data.valid_until,
      isSuperuser: claims.data.superuser,
    };
  }
}

export interface AdminTokenRequest {
  id: string;
  name: string;
  lifetimeSeconds: number;
}

/** Mints a superuser principal valid from `now` and returns it with its token. */
export function createAdminToken(
  codec: TokenCodec,
  request: AdminTokenRequest,
  now: number = Date.now(),
): { principal: Principal; token: string } {
  const principal: Principal = {
    id: request.id,
    name: request.name,
    validSince: now,
    validUntil: now + request.lifetimeSeconds * 1000,
    isSuperuser: true,
  };
  return { principal, token: codec.sign(principal) };
}
