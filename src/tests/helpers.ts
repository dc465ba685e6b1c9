import * as jose from 'jose';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../shared/config';
import { nowInSeconds } from '../shared/clock';
import { Logger } from '../shared/logger';
import { Role, User } from '../shared/types';
import { sessionStore } from '../api/store/sessionStore';
import { userStore } from '../api/store/userStore';

const secret = new TextEncoder().encode(config.auth.jwtSecret);

export const TEST_PASSWORD = 'test-password';

// Fixed clock for deterministic expiry arithmetic: 2026-03-02T12:00:00Z
export const BASE_TIME = new Date('2026-03-02T12:00:00Z');
export const BASE_SECONDS = Math.floor(BASE_TIME.getTime() / 1000);

export interface TokenOptions {
  sub?: string;
  username?: string;
  role?: Role;
  sid?: string;
  jti?: string;
  iss?: string;
  aud?: string;
  exp?: number;
  iat?: number;
  tokenType?: string;
}

function claims(options: TokenOptions): Record<string, unknown> {
  return {
    username: options.username ?? 'frontdesk1',
    role: options.role ?? 'frontdesk',
    sid: options.sid ?? uuidv4(),
    jti: options.jti ?? uuidv4(),
    token_type: options.tokenType ?? 'access',
  };
}

async function sign(options: TokenOptions, key: Uint8Array): Promise<string> {
  const now = nowInSeconds();

  return new jose.SignJWT(claims(options))
    .setProtectedHeader({ alg: 'HS256' })
    .setSubject(options.sub ?? 'user-1')
    .setIssuedAt(options.iat ?? now)
    .setExpirationTime(options.exp ?? now + 3600)
    .setIssuer(options.iss ?? config.auth.jwtIssuer)
    .setAudience(options.aud ?? config.auth.jwtAudience)
    .sign(key);
}

export async function createTestToken(options: TokenOptions = {}): Promise<string> {
  return sign(options, secret);
}

export async function createTokenWithWrongSignature(options: TokenOptions = {}): Promise<string> {
  return sign(options, new TextEncoder().encode('wrong-secret-key'));
}

export async function createExpiredToken(options: TokenOptions = {}): Promise<string> {
  const now = nowInSeconds();
  return sign({ ...options, iat: now - 7200, exp: now - 3600 }, secret);
}

export function createAlgNoneToken(options: TokenOptions = {}): string {
  const now = nowInSeconds();

  const header = { alg: 'none', typ: 'JWT' };
  const payload = {
    ...claims(options),
    sub: options.sub ?? 'user-1',
    iss: options.iss ?? config.auth.jwtIssuer,
    aud: options.aud ?? config.auth.jwtAudience,
    iat: options.iat ?? now,
    exp: options.exp ?? now + 3600,
  };

  const encodedHeader = Buffer.from(JSON.stringify(header)).toString('base64url');
  const encodedPayload = Buffer.from(JSON.stringify(payload)).toString('base64url');

  return `${encodedHeader}.${encodedPayload}.`;
}

export async function createStaffUser(username: string, role: Role, isActive = true): Promise<User> {
  return userStore.create({ username, password: TEST_PASSWORD, role, isActive });
}

/**
 * Opens a session for `user` and signs an access token for it that
 * expires `expiresInSeconds` from the current (test) time.
 */
export async function createSessionAndToken(
  user: User,
  expiresInSeconds: number = 3600
): Promise<{ token: string; sessionId: string; refreshToken: string }> {
  const { session, refreshToken } = await sessionStore.create(
    user.id,
    user.role,
    config.auth.refreshTokenLifetimeSeconds * 1000
  );
  const token = await createTestToken({
    sub: user.id,
    username: user.username,
    role: user.role,
    sid: session.id,
    exp: nowInSeconds() + expiresInSeconds,
  });
  return { token, sessionId: session.id, refreshToken };
}

export function createMockLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}
