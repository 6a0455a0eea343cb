import { sign } from 'jsonwebtoken';

import { buildBearerHeader, extractUserId } from './jwt.util';

const TEST_SECRET = 'test-secret';

function signToken(payload: object, secret = TEST_SECRET): string {
  return sign(payload, secret, { algorithm: 'HS256' });
}

const VALID_JWT = signToken({ sub: 'test-user-123' });
const JWT_ID_ONLY = signToken({ id: 'test-user-123' });
const JWT_EMPTY_SUB = signToken({ sub: '' });

describe('extractUserId', () => {
  it('returns userId from `sub` and the raw token for a valid Bearer header', () => {
    const result = extractUserId(`Bearer ${VALID_JWT}`, TEST_SECRET);

    expect(result.userId).toBe('test-user-123');
    expect(result.rawJwt).toBe(VALID_JWT);
  });

  it('throws when the authorization header is an empty string', () => {
    expect(() => extractUserId('', TEST_SECRET)).toThrow(
      'Authorization header is missing'
    );
  });

  it('throws when the header does not use the Bearer scheme', () => {
    expect(() => extractUserId('Basic dXNlcjpwYXNz', TEST_SECRET)).toThrow(
      'Authorization header must use Bearer scheme'
    );
  });

  it('throws when the token does not have three segments', () => {
    expect(() => extractUserId('Bearer abc.def', TEST_SECRET)).toThrow(
      'Malformed JWT: expected three dot-separated segments'
    );
  });

  it('rejects a token signed with a different secret', () => {
    const forged = signToken({ sub: 'test-user-123' }, 'other-secret');
    expect(() => extractUserId(`Bearer ${forged}`, TEST_SECRET)).toThrow(
      'Bearer token rejected: invalid signature'
    );
  });

  it('rejects an expired token', () => {
    const expired = signToken({
      sub: 'test-user-123',
      exp: Math.floor(Date.now() / 1000) - 60
    });
    expect(() => extractUserId(`Bearer ${expired}`, TEST_SECRET)).toThrow(
      'Bearer token rejected: jwt expired'
    );
  });

  it('throws when the payload has no `sub` claim', () => {
    expect(() => extractUserId(`Bearer ${JWT_ID_ONLY}`, TEST_SECRET)).toThrow(
      'Malformed JWT: payload is missing the required `sub` claim'
    );
  });

  it('throws when `sub` is empty', () => {
    expect(() => extractUserId(`Bearer ${JWT_EMPTY_SUB}`, TEST_SECRET)).toThrow(
      'Malformed JWT: payload is missing the required `sub` claim'
    );
  });
});

describe('buildBearerHeader', () => {
  it('prefixes the token with the Bearer scheme', () => {
    expect(buildBearerHeader('abc')).toBe('Bearer abc');
  });
});
