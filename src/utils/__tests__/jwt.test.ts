import jwt from 'jsonwebtoken';
import { describe, expect, it } from 'vitest';
import { SessionTokens, durationMs } from '../jwt';
import { ManualClock, MINUTE, TEST_SECRETS } from '../../testing/fixtures';

const alice = { accountId: 'acc_1', email: 'alice@example.com' };

function build(clock = new ManualClock()) {
  const tokens = new SessionTokens({ ...TEST_SECRETS, accessTtl: '15m', refreshTtl: '7d', now: clock.now });
  return { clock, tokens };
}

describe('durationMs', () => {
  it('parses ms-style strings and passes numbers through', () => {
    expect(durationMs('15m')).toBe(15 * MINUTE);
    expect(durationMs('7d')).toBe(7 * 24 * 60 * MINUTE);
    expect(durationMs(1234)).toBe(1234);
  });

  it('rejects nonsense', () => {
    expect(() => durationMs('soon')).toThrow('Invalid duration: soon');
    expect(() => durationMs(0)).toThrow('Invalid duration: 0');
  });
});

describe('SessionTokens', () => {
  it('requires both secrets', () => {
    expect(
      () => new SessionTokens({ accessSecret: '', refreshSecret: 'x', accessTtl: '15m', refreshTtl: '7d' })
    ).toThrow('JWT secrets must be configured');
  });

  it('round-trips the identity', () => {
    const { tokens } = build();
    const issued = tokens.issue(alice);
    expect(issued.expiresAt).toEqual(new Date('2025-01-01T00:15:00.000Z'));

    const decoded = tokens.decode(issued.token);
    expect(decoded).toEqual({
      ok: true,
      value: {
        accountId: 'acc_1',
        email: 'alice@example.com',
        kind: 'access',
        jti: issued.jti,
        issuedAt: new Date('2025-01-01T00:00:00.000Z'),
        expiresAt: new Date('2025-01-01T00:15:00.000Z'),
      },
    });
  });

  it('gives every token its own jti', () => {
    const { tokens } = build();
    expect(tokens.issue(alice).jti).not.toBe(tokens.issue(alice).jti);
  });

  it('reports expiry once the ttl has elapsed', () => {
    const { clock, tokens } = build();
    const { token } = tokens.issue(alice);

    clock.advance(14 * MINUTE);
    expect(tokens.decode(token).ok).toBe(true);

    clock.advance(6 * MINUTE);
    expect(tokens.decode(token)).toEqual({ ok: false, error: { kind: 'TokenExpired', message: 'Token has expired' } });
  });

  it('rejects a token signed with another secret', () => {
    const { tokens } = build();
    const forged = jwt.sign(
      { sub: 'acc_1', email: 'alice@example.com', typ: 'access', jti: 'j1', iat: 1735689600 },
      'some-other-secret',
      { expiresIn: 900 }
    );
    const result = tokens.decode(forged);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('TokenInvalid');
  });

  it('rejects garbage', () => {
    const { tokens } = build();
    const result = tokens.decode('not.a.jwt');
    expect(result).toEqual({ ok: false, error: { kind: 'TokenInvalid', message: 'Could not validate credentials' } });
  });

  it('does not accept a refresh token as an access token', () => {
    const { tokens } = build();
    const refresh = tokens.issue(alice, 'refresh');
    expect(tokens.decode(refresh.token, 'refresh').ok).toBe(true);

    const asAccess = tokens.decode(refresh.token, 'access');
    expect(asAccess.ok).toBe(false);
    if (!asAccess.ok) expect(asAccess.error.kind).toBe('TokenInvalid');
  });

  it('rejects a correctly signed token with the wrong typ claim', () => {
    const { tokens } = build();
    const token = jwt.sign(
      { sub: 'acc_1', email: 'alice@example.com', typ: 'refresh', jti: 'j1', iat: 1735689600 },
      TEST_SECRETS.accessSecret,
      { expiresIn: 900 }
    );
    expect(tokens.decode(token)).toEqual({ ok: false, error: { kind: 'TokenInvalid', message: 'Invalid token type' } });
  });
});
