import * as jose from 'jose';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { config } from '../shared/config';
import { getNow, nowInSeconds } from '../shared/clock';
import { AccessTokenPayload, ROLES, Role } from '../shared/types';

const secret = new TextEncoder().encode(config.auth.jwtSecret);

const AccessTokenClaimsSchema = z.object({
  sub: z.string().min(1),
  username: z.string().min(1),
  role: z.enum(ROLES),
  sid: z.string().min(1),
  jti: z.string().min(1),
  token_type: z.literal('access'),
  iss: z.string(),
  aud: z.string(),
  exp: z.number(),
  iat: z.number(),
});

export type TokenRejection =
  | 'malformed'
  | 'alg_none'
  | 'unexpected_alg'
  | 'expired'
  | 'invalid_claims'
  | 'invalid_signature'
  | 'missing_claims'
  | 'invalid';

export type TokenVerification =
  | { ok: true; payload: AccessTokenPayload }
  | { ok: false; reason: TokenRejection };

export const REJECTION_MESSAGES: Record<TokenRejection, string> = {
  malformed: 'Invalid token format',
  alg_none: 'Algorithm none not allowed',
  unexpected_alg: 'Unexpected algorithm',
  expired: 'Token expired',
  invalid_claims: 'Invalid token claims',
  invalid_signature: 'Invalid signature',
  missing_claims: 'Missing required claims',
  invalid: 'Invalid token',
};

/**
 * Returns the credential of a `Bearer <token>` header, or null when the
 * header is absent, uses another scheme or carries an empty token.
 */
export function extractBearerToken(header: string | undefined): string | null {
  if (!header || !header.startsWith('Bearer ')) {
    return null;
  }
  const token = header.slice(7).trim();
  return token || null;
}

function readAlgorithm(encodedHeader: string): string | undefined | null {
  try {
    const header: unknown = JSON.parse(Buffer.from(encodedHeader, 'base64url').toString());
    if (typeof header !== 'object' || header === null) {
      return null;
    }
    const alg: unknown = Reflect.get(header, 'alg');
    return typeof alg === 'string' ? alg : undefined;
  } catch {
    return null;
  }
}

/**
 * Verifies an access token against the configured secret, issuer and
 * audience, using the application clock for expiry.
 *
 * Verification failures are returned, not thrown. Errors that do not come
 * from token validation propagate to the caller.
 */
export async function verifyAccessToken(token: string): Promise<TokenVerification> {
  const parts = token.split('.');
  if (parts.length !== 3) {
    return { ok: false, reason: 'malformed' };
  }

  // Reject alg=none explicitly before verification
  const alg = readAlgorithm(parts[0]);
  if (alg === null) {
    return { ok: false, reason: 'malformed' };
  }
  if (alg?.toLowerCase() === 'none') {
    return { ok: false, reason: 'alg_none' };
  }
  if (alg !== 'HS256') {
    return { ok: false, reason: 'unexpected_alg' };
  }

  let claims: jose.JWTPayload;
  try {
    const { payload } = await jose.jwtVerify(token, secret, {
      issuer: config.auth.jwtIssuer,
      audience: config.auth.jwtAudience,
      algorithms: ['HS256'],
      currentDate: getNow(),
    });
    claims = payload;
  } catch (error) {
    if (error instanceof jose.errors.JWTExpired) {
      return { ok: false, reason: 'expired' };
    }
    if (error instanceof jose.errors.JWTClaimValidationFailed) {
      return { ok: false, reason: 'invalid_claims' };
    }
    if (error instanceof jose.errors.JWSSignatureVerificationFailed) {
      return { ok: false, reason: 'invalid_signature' };
    }
    if (error instanceof jose.errors.JOSEError) {
      return { ok: false, reason: 'invalid' };
    }
    throw error;
  }

  const parsed = AccessTokenClaimsSchema.safeParse(claims);
  if (!parsed.success) {
    return { ok: false, reason: 'missing_claims' };
  }
  return { ok: true, payload: parsed.data };
}

export interface IssuedAccessToken {
  token: string;
  expiresAt: number; // Unix epoch seconds
}

export async function issueAccessToken(
  user: { id: string; username: string; role: Role },
  sessionId: string
): Promise<IssuedAccessToken> {
  const now = nowInSeconds();
  const expiresAt = now + config.auth.accessTokenLifetimeSeconds;

  const token = await new jose.SignJWT({
    username: user.username,
    role: user.role,
    sid: sessionId,
    jti: uuidv4(),
    token_type: 'access',
  })
    .setProtectedHeader({ alg: 'HS256', typ: 'JWT' })
    .setSubject(user.id)
    .setIssuedAt(now)
    .setExpirationTime(expiresAt)
    .setIssuer(config.auth.jwtIssuer)
    .setAudience(config.auth.jwtAudience)
    .sign(secret);

  return { token, expiresAt };
}
