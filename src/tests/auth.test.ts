import request from 'supertest';
import { app, sessionStore, userStore } from '../api/index';
import { ensureSuperuser } from '../api/bootstrap';
import { config } from '../shared/config';
import { setTestNow } from '../shared/clock';
import { User } from '../shared/types';
import {
  BASE_SECONDS,
  BASE_TIME,
  TEST_PASSWORD,
  createAlgNoneToken,
  createExpiredToken,
  createMockLogger,
  createSessionAndToken,
  createStaffUser,
  createTestToken,
  createTokenWithWrongSignature,
} from './helpers';

let admin: User;
let frontdesk: User;

beforeAll(async () => {
  await sessionStore.connect();
  admin = await createStaffUser('auth-admin', 'admin');
  frontdesk = await createStaffUser('auth-frontdesk', 'frontdesk');
  await createStaffUser('auth-retired', 'kitchen', false);
});

afterAll(async () => {
  await sessionStore.disconnect();
});

beforeEach(() => {
  setTestNow(BASE_TIME);
});

afterEach(() => {
  setTestNow(null);
});

async function login(username: string, password: string = TEST_PASSWORD) {
  return request(app).post('/api/token/').send({ username, password });
}

// ==========================================
// A) Obtain token pair
// ==========================================

describe('A) POST /api/token/', () => {
  test('valid credentials return a token pair with expiry times', async () => {
    const res = await login('auth-frontdesk');

    expect(res.status).toBe(200);
    expect(typeof res.body.access).toBe('string');
    expect(typeof res.body.refresh).toBe('string');
    expect(res.body.access_expires_at).toBe(
      new Date((BASE_SECONDS + config.auth.accessTokenLifetimeSeconds) * 1000).toISOString()
    );
    expect(res.body.refresh_expires_at).toBe(
      new Date(BASE_TIME.getTime() + config.auth.refreshTokenLifetimeSeconds * 1000).toISOString()
    );
    expect(res.body.user.username).toBe('auth-frontdesk');
    expect(res.body.user.role).toBe('frontdesk');
    expect(res.body.user.passwordHash).toBeUndefined();
    expect(res.body.user.lastLogin).toBe(BASE_TIME.toISOString());
  });

  test('token responses advertise type and lifetimes', async () => {
    const res = await login('auth-frontdesk');

    expect(res.headers['x-token-type']).toBe('Bearer');
    expect(res.headers['x-access-token-lifetime']).toBe(String(config.auth.accessTokenLifetimeSeconds));
    expect(res.headers['x-refresh-token-lifetime']).toBe(String(config.auth.refreshTokenLifetimeSeconds));
  });

  test('issued access token works on protected routes', async () => {
    const { body } = await login('auth-frontdesk');

    const res = await request(app).get('/api/users/me/').set('Authorization', `Bearer ${body.access}`);

    expect(res.status).toBe(200);
    expect(res.body.id).toBe(frontdesk.id);
  });

  test('wrong password returns 401', async () => {
    const res = await login('auth-frontdesk', 'not-the-password');
    expect(res.status).toBe(401);
  });

  test('unknown user returns 401', async () => {
    const res = await login('nobody');
    expect(res.status).toBe(401);
  });

  test('inactive user returns 401', async () => {
    const res = await login('auth-retired');
    expect(res.status).toBe(401);
  });

  test('missing fields return 400', async () => {
    const res = await request(app).post('/api/token/').send({ username: 'auth-frontdesk' });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Username and password are required');
  });

  test('malformed JSON returns 400', async () => {
    const res = await request(app)
      .post('/api/token/')
      .set('Content-Type', 'application/json')
      .send('{"username":');
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Invalid request body');
  });
});

// ==========================================
// B) Refresh
// ==========================================

describe('B) POST /api/token/refresh/', () => {
  test('refresh rotates the refresh token', async () => {
    const { body: pair } = await login('auth-admin');

    const res = await request(app).post('/api/token/refresh/').send({ refresh: pair.refresh });

    expect(res.status).toBe(200);
    expect(res.body.refresh).not.toBe(pair.refresh);
    expect(typeof res.body.access).toBe('string');
    expect(res.body.access_expires_at).toBe(
      new Date((BASE_SECONDS + config.auth.accessTokenLifetimeSeconds) * 1000).toISOString()
    );
    expect(res.headers['x-token-type']).toBe('Bearer');
  });

  test('refreshed access token keeps the session role', async () => {
    const { body: pair } = await login('auth-admin');
    const { body: refreshed } = await request(app).post('/api/token/refresh/').send({ refresh: pair.refresh });

    const res = await request(app).get('/api/users/me/').set('Authorization', `Bearer ${refreshed.access}`);

    expect(res.status).toBe(200);
    expect(res.body.role).toBe('admin');
  });

  test('a refresh token cannot be used twice', async () => {
    const { body: pair } = await login('auth-admin');
    await request(app).post('/api/token/refresh/').send({ refresh: pair.refresh });

    const res = await request(app).post('/api/token/refresh/').send({ refresh: pair.refresh });

    expect(res.status).toBe(401);
    expect(res.body.error).toBe('Refresh token already used');
  });

  test('unknown refresh token returns 401', async () => {
    const res = await request(app).post('/api/token/refresh/').send({ refresh: 'no-such-token' });
    expect(res.status).toBe(401);
    expect(res.body.error).toBe('Invalid refresh token');
  });

  test('missing refresh token returns 400', async () => {
    const res = await request(app).post('/api/token/refresh/').send({});
    expect(res.status).toBe(400);
  });

  test('refresh after logout is rejected', async () => {
    const { body: pair } = await login('auth-admin');
    await request(app).post('/api/users/logout/').set('Authorization', `Bearer ${pair.access}`);

    const res = await request(app).post('/api/token/refresh/').send({ refresh: pair.refresh });

    expect(res.status).toBe(401);
  });
});

// ==========================================
// C) Verify
// ==========================================

describe('C) POST /api/token/verify/', () => {
  test('valid token verifies', async () => {
    const token = await createTestToken();
    const res = await request(app).post('/api/token/verify/').send({ token });
    expect(res.status).toBe(200);
    expect(res.body).toEqual({});
  });

  test('expired token does not verify', async () => {
    const token = await createExpiredToken();
    const res = await request(app).post('/api/token/verify/').send({ token });
    expect(res.status).toBe(401);
    expect(res.body).toEqual({ error: 'Token is invalid or expired', code: 'token_not_valid' });
  });

  test('missing token returns 400', async () => {
    const res = await request(app).post('/api/token/verify/').send({});
    expect(res.status).toBe(400);
  });
});

// ==========================================
// D) Authentication middleware
// ==========================================

describe('D) Protected routes', () => {
  test('missing token returns 401', async () => {
    const res = await request(app).get('/api/users/me/');
    expect(res.status).toBe(401);
    expect(res.body.error).toBe('Missing authorization header');
  });

  test('malformed Authorization header returns 401', async () => {
    const res = await request(app).get('/api/users/me/').set('Authorization', 'NotBearer token');
    expect(res.status).toBe(401);
    expect(res.body.error).toBe('Malformed authorization header');
  });

  test('invalid signature returns 401', async () => {
    const token = await createTokenWithWrongSignature({ sub: frontdesk.id });
    const res = await request(app).get('/api/users/me/').set('Authorization', `Bearer ${token}`);
    expect(res.status).toBe(401);
    expect(res.body.error).toBe('Invalid signature');
  });

  test('wrong issuer returns 401', async () => {
    const token = await createTestToken({ iss: 'someone-else' });
    const res = await request(app).get('/api/users/me/').set('Authorization', `Bearer ${token}`);
    expect(res.status).toBe(401);
    expect(res.body.error).toBe('Invalid token claims');
  });

  test('alg=none token returns 401', async () => {
    const token = createAlgNoneToken({ role: 'superadmin' });
    const res = await request(app).get('/api/users/me/').set('Authorization', `Bearer ${token}`);
    expect(res.status).toBe(401);
    expect(res.body.error).toBe('Algorithm none not allowed');
  });

  test('token of another type returns 401', async () => {
    const token = await createTestToken({ tokenType: 'refresh' });
    const res = await request(app).get('/api/users/me/').set('Authorization', `Bearer ${token}`);
    expect(res.status).toBe(401);
    expect(res.body.error).toBe('Missing required claims');
  });

  test('token without a live session returns 401', async () => {
    const token = await createTestToken({ sub: frontdesk.id, username: frontdesk.username });
    const res = await request(app).get('/api/users/me/').set('Authorization', `Bearer ${token}`);
    expect(res.status).toBe(401);
    expect(res.body.error).toBe('Session not found');
  });

  test('logout revokes the session', async () => {
    const { token } = await createSessionAndToken(admin);

    const logout = await request(app).post('/api/users/logout/').set('Authorization', `Bearer ${token}`);
    expect(logout.status).toBe(200);

    const res = await request(app).get('/api/users/me/').set('Authorization', `Bearer ${token}`);
    expect(res.status).toBe(401);
    expect(res.body.error).toBe('Session revoked');
  });

  test('unknown API route returns 404', async () => {
    const res = await request(app).get('/api/nothing-here/');
    expect(res.status).toBe(404);
  });
});

// ==========================================
// E) Superuser bootstrap
// ==========================================

describe('E) ensureSuperuser', () => {
  test('creates the superuser once', async () => {
    const logger = createMockLogger();
    const superuser = { username: 'owner', password: TEST_PASSWORD, email: 'owner@example.com' };

    expect(await ensureSuperuser(userStore, superuser, logger)).toBe(true);
    expect(await ensureSuperuser(userStore, superuser, logger)).toBe(false);

    const owner = await userStore.getByUsername('owner');
    expect(owner?.role).toBe('superadmin');
    expect(owner?.email).toBe('owner@example.com');
  });

  test('skips when no credentials are configured', async () => {
    const logger = createMockLogger();
    expect(await ensureSuperuser(userStore, null, logger)).toBe(false);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

describe('Health', () => {
  test('GET /health returns 200 without Authorization', async () => {
    const res = await request(app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok', service: 'frontdesk-api' });
  });
});

describe('CORS', () => {
  test('allowed origin can read the token headers', async () => {
    const res = await request(app).get('/health').set('Origin', 'http://localhost:3000');

    expect(res.headers['access-control-allow-origin']).toBe('http://localhost:3000');
    expect(res.headers['access-control-expose-headers']).toBe(
      'X-Token-Type, X-Token-Refresh-Warning, X-Token-Expires-In, X-Token-Refresh-URL, ' +
        'X-Access-Token-Lifetime, X-Refresh-Token-Lifetime'
    );
  });

  test('preflight from an allowed origin returns 204', async () => {
    const res = await request(app)
      .options('/api/orders/')
      .set('Origin', 'https://frontdesk.example.com')
      .set('Access-Control-Request-Method', 'POST');

    expect(res.status).toBe(204);
    expect(res.headers['access-control-max-age']).toBe('86400');
  });

  test('preflight from an unknown origin returns 403', async () => {
    const res = await request(app)
      .options('/api/orders/')
      .set('Origin', 'https://evil.example.com')
      .set('Access-Control-Request-Method', 'POST');

    expect(res.status).toBe(403);
    expect(res.headers['access-control-allow-origin']).toBeUndefined();
  });
});
