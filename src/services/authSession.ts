import { BadRequestError, UnauthorizedError } from '../errors/index.js';
import { AuthOutcome, IdentityVerifier, SaveDirective } from '../types/gateway.js';
import { ANONYMOUS_PRINCIPAL, TokenCodec } from './tokenCodec.js';

export const TOKEN_HEADER = 'x-ursa-token';
export const EXPIRES_HEADER = 'x-ursa-expires';
export const USERNAME_HEADER = 'x-ursa-username';
export const SERVER_ID_HEADER = 'x-ursa-serverid';

/** The slice of an incoming request the session manager reads. */
export type HeaderLookup = (name: string) => string | undefined;

export interface AuthSessionDeps {
  allowAnonymous: boolean;
  codec: TokenCodec;
  verifier: IdentityVerifier;
}

/**
 * Decides who is calling:
 *   1. anonymous mode → fixed principal
 *   2. valid `x-ursa-token` → reuse its principal
 *   3. otherwise → session-server login from `x-ursa-username` / `x-ursa-serverid`
 *
 * An invalid or expired token falls through to (3) instead of failing.
 */
export class AuthSessionManager {
  constructor(private readonly deps: AuthSessionDeps) {}

  async resolve(header: HeaderLookup): Promise<AuthOutcome> {
    if (this.deps.allowAnonymous) {
      return { kind: 'anonymous', principal: ANONYMOUS_PRINCIPAL };
    }

    const token = header(TOKEN_HEADER);
    if (token) {
      const principal = this.deps.codec.verify(token);
      if (principal) return { kind: 'reauthenticated', principal };
    }

    const username = header(USERNAME_HEADER);
    if (!username) {
      return { kind: 'rejected', error: new BadRequestError('Missing username to authenticate') };
    }
    const serverId = header(SERVER_ID_HEADER);
    if (!serverId) {
      return { kind: 'rejected', error: new BadRequestError('Missing serverid to authenticate') };
    }

    const principal = await this.deps.verifier.verify(username, serverId);
    if (!principal) {
      return { kind: 'rejected', error: new UnauthorizedError() };
    }
    return { kind: 'fresh-auth', principal };
  }
}

export function saveDirectiveFor(outcome: AuthOutcome): SaveDirective {
  switch (outcome.kind) {
    case 'anonymous':
    case 'rejected':
      return { kind: 'dont-save' };
    case 'reauthenticated':
      return { kind: 'refresh-expiry', validUntil: outcome.principal.validUntil };
    case 'fresh-auth':
      return { kind: 'issue-token', principal: outcome.principal };
  }
}
