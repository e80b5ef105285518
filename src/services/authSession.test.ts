import { BadRequestError, UnauthorizedError } from '../errors/index.js';
import { AuthOutcome, IdentityVerifier, Principal } from '../types/gateway.js';
import { AuthSessionManager, saveDirectiveFor } from './authSession.js';
import { ANONYMOUS_PRINCIPAL, TokenCodec } from './tokenCodec.js';

const NOW = 1_700_000_000_000;

const steve: Principal = {
  id: '069a79f4-44e9-4726-a5be-fca90e38aaf5',
  name: 'Steve',
  validSince: NOW,
  validUntil: NOW + 3_600_000,
  isSuperuser: false,
};

function headers(values: Record<string, string>) {
  return (name: string): string | undefined => values[name];
}

describe('AuthSessionManager', () => {
  let now: number;
  let codec: TokenCodec;
  let verify: jest.Mock<Promise<Principal | null>, [string, string]>;
  let verifier: IdentityVerifier;

  beforeEach(() => {
    now = NOW;
    codec = new TokenCodec('test-secret', () => now);
    verify = jest.fn<Promise<Principal | null>, [string, string]>().mockResolvedValue(steve);
    verifier = { verify };
  });

  const manager = (allowAnonymous = false) => new AuthSessionManager({ allowAnonymous, codec, verifier });

  it('returns the fixed anonymous principal in anonymous mode', async () => {
    const outcome = await manager(true).resolve(headers({ 'x-ursa-token': codec.sign(steve) }));

    expect(outcome).toEqual({ kind: 'anonymous', principal: ANONYMOUS_PRINCIPAL });
    expect(verify).not.toHaveBeenCalled();
  });

  it('reuses a valid token without contacting the session server', async () => {
    const outcome = await manager().resolve(
      headers({ 'x-ursa-token': codec.sign(steve), 'x-ursa-username': 'Steve', 'x-ursa-serverid': 'abc' }),
    );

    expect(outcome).toEqual({ kind: 'reauthenticated', principal: steve });
    expect(verify).not.toHaveBeenCalled();
  });

  it('falls through to a fresh login when the token has expired', async () => {
    const token = codec.sign(steve);
    now = steve.validUntil + 1;

    const outcome = await manager().resolve(
      headers({ 'x-ursa-token': token, 'x-ursa-username': 'Steve', 'x-ursa-serverid': 'abc' }),
    );

    expect(outcome).toEqual({ kind: 'fresh-auth', principal: steve });
    expect(verify).toHaveBeenCalledWith('Steve', 'abc');
  });

  it('falls through to a fresh login when the token does not verify', async () => {
    const outcome = await manager().resolve(
      headers({ 'x-ursa-token': 'garbage', 'x-ursa-username': 'Steve', 'x-ursa-serverid': 'abc' }),
    );

    expect(outcome.kind).toBe('fresh-auth');
  });

  it('rejects with a bad request when login headers are missing', async () => {
    const noUsername = await manager().resolve(headers({ 'x-ursa-serverid': 'abc' }));
    const noServerId = await manager().resolve(headers({ 'x-ursa-username': 'Steve' }));

    expect(noUsername).toEqual({ kind: 'rejected', error: new BadRequestError('Missing username to authenticate') });
    expect(noServerId).toEqual({ kind: 'rejected', error: new BadRequestError('Missing serverid to authenticate') });
    expect(verify).not.toHaveBeenCalled();
  });

  it('rejects as unauthorized when the session server denies the login', async () => {
    verify.mockResolvedValue(null);

    const outcome = await manager().resolve(headers({ 'x-ursa-username': 'Steve', 'x-ursa-serverid': 'abc' }));

    expect(outcome.kind).toBe('rejected');
    if (outcome.kind === 'rejected') {
      expect(outcome.error).toBeInstanceOf(UnauthorizedError);
    }
  });

  it('accepts the token issued by a fresh login on the next request', async () => {
    const first = await manager().resolve(headers({ 'x-ursa-username': 'Steve', 'x-ursa-serverid': 'abc' }));
    const directive = saveDirectiveFor(first);
    if (directive.kind !== 'issue-token') throw new Error(`unexpected directive ${directive.kind}`);

    now += 1000;
    const second = await manager().resolve(headers({ 'x-ursa-token': codec.sign(directive.principal) }));

    expect(second).toEqual({ kind: 'reauthenticated', principal: steve });
    expect(verify).toHaveBeenCalledTimes(1);
  });
});

describe('saveDirectiveFor', () => {
  it.each<[AuthOutcome, ReturnType<typeof saveDirectiveFor>]>([
    [{ kind: 'anonymous', principal: ANONYMOUS_PRINCIPAL }, { kind: 'dont-save' }],
    [{ kind: 'reauthenticated', principal: steve }, { kind: 'refresh-expiry', validUntil: steve.validUntil }],
    [{ kind: 'fresh-auth', principal: steve }, { kind: 'issue-token', principal: steve }],
    [{ kind: 'rejected', error: new UnauthorizedError() }, { kind: 'dont-save' }],
  ])('maps %o', (outcome, expected) => {
    expect(saveDirectiveFor(outcome)).toEqual(expected);
  });
});
