import request from 'supertest';
import { app, userStore } from '../api/index';
import { setTestNow } from '../shared/clock';
import { User } from '../shared/types';
import { BASE_TIME, TEST_PASSWORD, createSessionAndToken, createStaffUser } from './helpers';

let owner: User;
let admin: User;
let frontdesk: User;

beforeAll(async () => {
  owner = await createStaffUser('users-owner', 'superadmin');
  admin = await createStaffUser('users-admin', 'admin');
  frontdesk = await createStaffUser('users-frontdesk', 'frontdesk');
});

beforeEach(() => {
  setTestNow(BASE_TIME);
});

afterEach(() => {
  setTestNow(null);
});

async function tokenFor(user: User): Promise<string> {
  const { token } = await createSessionAndToken(user);
  return token;
}

async function createAccount(body: Record<string, unknown>, user: User = admin) {
  return request(app)
    .post('/api/users/')
    .set('Authorization', `Bearer ${await tokenFor(user)}`)
    .send(body);
}

describe('A) POST /api/users/', () => {
  test('admin creates a staff account that can log in', async () => {
    const res = await createAccount({
      username: 'ama.kitchen',
      password: TEST_PASSWORD,
      role: 'kitchen',
      firstName: 'Ama',
      email: 'ama@example.com',
    });

    expect(res.status).toBe(201);
    expect(res.body).toEqual({
      id: expect.any(String),
      username: 'ama.kitchen',
      email: 'ama@example.com',
      firstName: 'Ama',
      lastName: '',
      role: 'kitchen',
      isActive: true,
      lastLogin: null,
      dateJoined: BASE_TIME.toISOString(),
    });

    const login = await request(app).post('/api/token/').send({ username: 'ama.kitchen', password: TEST_PASSWORD });
    expect(login.status).toBe(200);
  });

  test('a taken username returns 409', async () => {
    const res = await createAccount({ username: 'users-frontdesk', password: TEST_PASSWORD, role: 'frontdesk' });

    expect(res.status).toBe(409);
    expect(res.body.error).toBe('Username already exists');
  });

  test('short passwords return 400', async () => {
    const res = await createAccount({ username: 'kofi', password: 'short', role: 'delivery' });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe('password: String must contain at least 8 character(s)');
  });

  test('unknown roles return 400', async () => {
    const res = await createAccount({ username: 'kofi', password: TEST_PASSWORD, role: 'manager' });

    expect(res.status).toBe(400);
    expect(res.body.error).toMatch(/^role: /);
  });

  test('only a superadmin creates superadmins', async () => {
    const body = { username: 'second-owner', password: TEST_PASSWORD, role: 'superadmin' };

    const byAdmin = await createAccount(body, admin);
    const byOwner = await createAccount(body, owner);

    expect(byAdmin.status).toBe(403);
    expect(byAdmin.body.error).toBe('Only a superadmin can create superadmin accounts');
    expect(byOwner.status).toBe(201);
    expect((await userStore.getByUsername('second-owner'))?.role).toBe('superadmin');
  });

  test('front desk staff cannot create accounts', async () => {
    const res = await createAccount({ username: 'kofi', password: TEST_PASSWORD, role: 'kitchen' }, frontdesk);

    expect(res.status).toBe(403);
    expect(res.body.error).toBe('Insufficient role permissions');
  });
});

describe('B) GET /api/users/', () => {
  test('lists accounts without password hashes', async () => {
    const res = await request(app)
      .get('/api/users/')
      .set('Authorization', `Bearer ${await tokenFor(admin)}`);

    expect(res.status).toBe(200);
    expect(res.body.map((u: { username: string }) => u.username)).toEqual(
      (await userStore.list()).map(u => u.username)
    );
    expect(res.body.every((u: Record<string, unknown>) => !('passwordHash' in u))).toBe(true);
  });

  test('filters by role', async () => {
    const res = await request(app)
      .get('/api/users/?role=frontdesk')
      .set('Authorization', `Bearer ${await tokenFor(owner)}`);

    expect(res.status).toBe(200);
    expect(res.body.map((u: { username: string }) => u.username)).toEqual(['users-frontdesk']);
  });

  test('an unknown role filter returns 400', async () => {
    const res = await request(app)
      .get('/api/users/?role=chef')
      .set('Authorization', `Bearer ${await tokenFor(admin)}`);

    expect(res.status).toBe(400);
  });

  test('front desk staff cannot list accounts', async () => {
    const res = await request(app)
      .get('/api/users/')
      .set('Authorization', `Bearer ${await tokenFor(frontdesk)}`);

    expect(res.status).toBe(403);
  });
});
