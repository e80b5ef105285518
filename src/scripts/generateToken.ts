import { randomUUID } from 'node:crypto';
import dotenv from 'dotenv';
import { createAdminToken, TokenCodec } from '../services/tokenCodec.js';

// Usage: npm run token -- <name> [lifetimeSeconds]
function main(argv: string[]): void {
  dotenv.config();
  const secret = process.env.URSA_SECRET;
  if (!secret) {
    throw new Error('URSA_SECRET must be set to sign tokens');
  }

  const [name, lifetimeArg] = argv;
  if (!name) {
    throw new Error('Usage: generateToken <name> [lifetimeSeconds]');
  }
  const lifetimeSeconds = lifetimeArg === undefined ? 24 * 60 * 60 : Number(lifetimeArg);
  if (!Number.isInteger(lifetimeSeconds) || lifetimeSeconds <= 0) {
    throw new Error('lifetimeSeconds must be a positive integer');
  }

  const { principal, token } = createAdminToken(new TokenCodec(secret), {
    id: randomUUID(),
    name,
    lifetimeSeconds,
  });
  console.log(`x-ursa-token: ${token}`);
  console.log(`x-ursa-expires: ${principal.validUntil} (${new Date(principal.validUntil).toISOString()})`);
}

try {
  main(process.argv.slice(2));
} catch (error) {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
}
