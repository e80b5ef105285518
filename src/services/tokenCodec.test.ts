import { sign } from 'jsonwebtoken';
import { Principal } from '../types/gateway.js';
import { ANONYMOUS_PRINCIPAL, createAdminToken, TokenCodec } from './tokenCodec.js';

const SECRET = 'test-secret';
const NOW = 1_700_000_000_000;

const steve: Principal = {
  id: '069a79f4-44e9-4726-a5be-fca90e38aaf5',
  name: 'Steve',
  validSince: NOW - 1000,
  validUntil: NOW + 60_000,
  isSuperuser: false,
};

describe('TokenCodec', () => {
  it('verifies a token it signed inside the validity window', () => {
    const codec = new TokenCodec(SECRET, () => NOW);

    expect(codec.verify(codec.sign(steve))).toEqual(steve);
  });

  it('accepts the window boundaries', () => {
    const token = new TokenCodec(SECRET).sign(steve);

    expect(new TokenCodec(SECRET, () => steve.validSince).verify(token)).toEqual(steve);
    expect(new TokenCodec(SECRET, () => steve.validUntil).verify(token)).toEqual(steve);
  });

  it('treats expired and not-yet-valid tokens as absent', () => {
    const token = new TokenCodec(SECRET).sign(steve);

    expect(new TokenCodec(SECRET, () => steve.validUntil + 1).verify(token)).toBeNull();
    expect(new TokenCodec(SECRET, () => steve.validSince - 1).verify(token)).toBeNull();
  });

  it('verifies an unbounded token at any time', () => {
    const unbounded: Principal = { ...steve, validSince: 0, validUntil: Number.MAX_SAFE_INTEGER };
    const token = new TokenCodec(SECRET).sign(unbounded);

    for (const now of [0, NOW, 4_102_444_800_000]) {
      expect(new TokenCodec(SECRET, () => now).verify(token)).toEqual(unbounded);
    }
  });

  it('rejects tokens signed with another secret', () => {
    const token = new TokenCodec('other-secret').sign(steve);

    expect(new TokenCodec(SECRET, () => NOW).verify(token)).toBeNull();
  });

  it('rejects tokens signed with another algorithm', () => {
    const token = sign(
      { id: steve.id, name: steve.name, valid_since: steve.validSince, valid_until: steve.validUntil },
      SECRET,
      { algorithm: 'HS256', noTimestamp: true },
    );

    expect(new TokenCodec(SECRET, () => NOW).verify(token)).toBeNull();
  });

  it('rejects tampered and malformed tokens', () => {
    const codec = new TokenCodec(SECRET, () => NOW);
    const [header, , signature] = codec.sign(steve).split('.');
    const forgedClaims = Buffer.from(
      JSON.stringify({ id: steve.id, name: steve.name, valid_since: 0, valid_until: NOW * 2, superuser: true }),
    ).toString('base64url');

    expect(codec.verify(`${header}.${forgedClaims}.${signature}`)).toBeNull();
    expect(codec.verify('not-a-token')).toBeNull();
    expect(codec.verify('')).toBeNull();
  });

  it('rejects validly signed tokens with the wrong claim shape', () => {
    const token = sign({ sub: 'someone' }, SECRET, { algorithm: 'HS384', noTimestamp: true });

    expect(new TokenCodec(SECRET, () => NOW).verify(token)).toBeNull();
  });

  it('writes millisecond claims without iat', () => {
    const [, claims] = new TokenCodec(SECRET).sign(steve).split('.');

    expect(JSON.parse(Buffer.from(claims, 'base64url').toString('utf8'))).toEqual({
      id: steve.id,
      name: 'Steve',
      valid_since: NOW - 1000,
      valid_until: NOW + 60_000,
      superuser: false,
    });
  });
});

describe('createAdminToken', () => {
  it('mints a superuser principal valid for the requested lifetime', () => {
    const codec = new TokenCodec(SECRET, () => NOW + 5000);
    const { principal, token } = createAdminToken(
      codec,
      { id: '00000000-0000-4000-8000-000000000001', name: 'admin', lifetimeSeconds: 60 },
      NOW,
    );

    expect(principal).toEqual({
      id: '00000000-0000-4000-8000-000000000001',
      name: 'admin',
      validSince: NOW,
      validUntil: NOW + 60_000,
      isSuperuser: true,
    });
    expect(codec.verify(token)).toEqual(principal);
  });
});

describe('ANONYMOUS_PRINCIPAL', () => {
  it('never expires and is not a superuser', () => {
    expect(ANONYMOUS_PRINCIPAL).toEqual({
      id: '00000000-0000-0000-0000-000000000000',
      name: 'Anonymous',
      validSince: 0,
      validUntil: Number.MAX_SAFE_INTEGER,
      isSuperuser: false,
    });
  });
});
