import { z } from 'zod';
import type { Logger } from '../lib/logger.js';
import { Clock, IdentityVerifier, Principal } from '../types/gateway.js';

const sessionProfileSchema = z.object({
  id: z.string().regex(/^[0-9a-fA-F]{32}$/).or(z.string().uuid()),
  name: z.string().min(1),
});

/** Session servers answer with undashed ids; principals carry the dashed form. */
export function toDashedUuid(id: string): string {
  const hex = id.replace(/-/g, '').toLowerCase();
  return [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20)].join('-');
}

export interface SessionServerConfig {
  baseUrl: string;
  tokenLifetimeSeconds: number;
  clock?: Clock;
  logger: Logger;
  fetchImpl?: typeof fetch;
}

/**
 * Asks the session server whether `username` has just joined a server using
 * `serverId`. The session server's answer is taken at face value.
 */
export class SessionServerVerifier implements IdentityVerifier {
  private readonly endpoint: string;
  private readonly clock: Clock;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly config: SessionServerConfig) {
    this.endpoint = new URL('/session/minecraft/hasJoined', config.baseUrl).toString();
    this.clock = config.clock ?? Date.now;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async verify(username: string, serverId: string): Promise<Principal | null> {
    const url = new URL(this.endpoint);
    url.searchParams.set('username', username);
    url.searchParams.set('serverId', serverId);

    let response: Response;
    try {
      response = await this.fetchImpl(url);
    } catch (error) {
      this.config.logger.warn({ err: error, username }, 'session server unreachable');
      return null;
    }

    if (response.status !== 200) {
      this.config.logger.info({ username, status: response.status }, 'session server rejected login');
      return null;
    }

    const profile = sessionProfileSchema.safeParse(await response.json().catch(() => undefined));
    if (!profile.success) {
      this.config.logger.warn({ username }, 'session server returned an unreadable profile');
      return null;
    }

    const now = this.clock();
    return {
      id: toDashedUuid(profile.data.id),
      name: profile.data.name,
      validSince: now,
      validUntil: now + this.config.tokenLifetimeSeconds * 1000,
      isSuperuser: false,
    };
  }
}
