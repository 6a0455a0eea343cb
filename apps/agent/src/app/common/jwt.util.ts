import { JsonWebTokenError, verify } from 'jsonwebtoken';

/**
 * Verify a `Bearer` authorization header and return the caller identity.
 * The token must be HS256-signed with the shared secret and carry a
 * non-empty `sub` claim.
 */
export function extractUserId(
  authHeader: string,
  secret: string
): {
  userId: string;
  rawJwt: string;
} {
  if (!authHeader) {
    throw new Error('Authorization header is missing');
  }

  if (!authHeader.startsWith('Bearer ')) {
    throw new Error('Authorization header must use Bearer scheme');
  }

  const rawJwt = authHeader.slice('Bearer '.length).trim();
  if (rawJwt.split('.').length !== 3) {
    throw new Error('Malformed JWT: expected three dot-separated segments');
  }

  let payload: unknown;
  try {
    payload = verify(rawJwt, secret, { algorithms: ['HS256'] });
  } catch (err) {
    const reason = err instanceof JsonWebTokenError ? err.message : String(err);
    throw new Error(`Bearer token rejected: ${reason}`);
  }

  if (
    typeof payload !== 'object' ||
    payload === null ||
    !('sub' in payload) ||
    typeof payload.sub !== 'string' ||
    payload.sub === ''
  ) {
    throw new Error('Malformed JWT: payload is missing the required `sub` claim');
  }

  return { userId: payload.sub, rawJwt };
}

export function buildBearerHeader(jwt: string): string {
  return `Bearer ${jwt}`;
}
