import { sign } from 'jsonwebtoken';

export const fixtureSecret = 'test-secret';
export const fixtureUserId = 'fixture-user-1';
export const otherUserId = 'fixture-user-2';

export function makeJwt(
  payload: Record<string, unknown> = { sub: fixtureUserId },
  secret: string = fixtureSecret
): string {
  return sign(payload, secret, { algorithm: 'HS256' });
}

export const validJwt = makeJwt();
export const validAuthHeader = `Bearer ${validJwt}`;
export const otherUserAuthHeader = `Bearer ${makeJwt({ sub: otherUserId })}`;

export const jwtWrongSecret = makeJwt({ sub: fixtureUserId }, 'other-secret');
