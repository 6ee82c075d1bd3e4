import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildHarness, type TestHarness } from '../test-utils/harness.js';

describe('auth routes', () => {
  let harness: TestHarness;

  beforeEach(async () => {
    harness = await buildHarness();
  });

  afterEach(async () => {
    await harness.close();
  });

  function signup(email: string, password = 'test-password') {
    return harness.server.inject({
      method: 'POST',
      url: '/api/auth/signup',
      payload: { username: email.split('@')[0], email, password },
    });
  }

  function login(email: string, password = 'test-password') {
    return harness.server.inject({
      method: 'POST',
      url: '/api/auth/login',
      payload: { email, password },
    });
  }

  function refresh(refreshToken: string) {
    return harness.server.inject({
      method: 'POST',
      url: '/api/auth/refresh_token',
      payload: { refreshToken },
    });
  }

  describe('POST /api/auth/signup', () => {
    it('makes the first account an admin and later ones users', async () => {
      const first = await signup('first@example.com');
      const second = await signup('second@example.com');

      expect(first.statusCode).toBe(201);
      expect(first.json()).toMatchObject({ id: 1, username: 'first', email: 'first@example.com', role: 'admin' });
      expect(second.json()).toMatchObject({ id: 2, role: 'user' });
    });

    it('never returns the password hash or refresh token', async () => {
      const response = await signup('first@example.com');
      expect(Object.keys(response.json()).sort()).toEqual(['createdAt', 'email', 'id', 'role', 'username']);
    });

    it('stores a bcrypt hash, not the password', async () => {
      await signup('first@example.com');

      const stored = await harness.server.repositories.users.findByEmail('first@example.com');
      expect(stored?.password).not.toBe('test-password');
      expect(stored?.password.startsWith('$2b$')).toBe(true);
    });

    it('answers 409 for a registered email', async () => {
      await signup('first@example.com');

      const response = await signup('FIRST@example.com');

      expect(response.statusCode).toBe(409);
      expect(response.json().message).toBe('Account with this email already exists');
    });

    it('grants admin to exactly one of two simultaneous first sign-ups', async () => {
      const responses = await Promise.all([signup('alpha@example.com'), signup('bravo@example.com')]);

      expect(responses.map((r) => r.statusCode)).toEqual([201, 201]);
      expect(responses.map((r) => r.json().role).sort()).toEqual(['admin', 'user']);
      expect(await harness.server.repositories.users.countByRole('admin')).toBe(1);
    });

    it('answers 409 to the loser of two simultaneous sign-ups with one email', async () => {
      const responses = await Promise.all([signup('xray@example.com'), signup('xray@example.com')]);

      expect(responses.map((r) => r.statusCode).sort()).toEqual([201, 409]);
      const conflict = responses.find((r) => r.statusCode === 409);
      expect(conflict?.json()).toMatchObject({
        error: 'Conflict',
        message: 'Account with this email already exists',
        code: 'CONFLICT',
      });
    });

    it('rejects a short password', async () => {
      const response = await signup('first@example.com', '123');
      expect(response.statusCode).toBe(400);
    });
  });

  describe('POST /api/auth/login', () => {
    beforeEach(async () => {
      await signup('first@example.com');
    });

    it('returns a bearer token pair that opens protected routes', async () => {
      const response = await login('first@example.com');

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.tokenType).toBe('bearer');

      const me = await harness.server.inject({
        method: 'GET',
        url: '/api/users/me',
        headers: { authorization: `Bearer ${body.accessToken}` },
      });
      expect(me.statusCode).toBe(200);
      expect(me.json()).toMatchObject({ email: 'first@example.com', role: 'admin' });
    });

    it('stores the issued refresh token', async () => {
      const body = (await login('first@example.com')).json();

      const stored = await harness.server.repositories.users.findByEmail('first@example.com');
      expect(stored?.refreshToken).toBe(body.refreshToken);
    });

    it('answers 401 for a wrong password', async () => {
      const response = await login('first@example.com', 'wrong-password');

      expect(response.statusCode).toBe(401);
      expect(response.json().message).toBe('Invalid email or password');
    });

    it('answers 401 for an unknown email', async () => {
      const response = await login('nobody@example.com');
      expect(response.statusCode).toBe(401);
    });
  });

  describe('POST /api/auth/refresh_token', () => {
    let refreshToken: string;

    beforeEach(async () => {
      await signup('first@example.com');
      refreshToken = (await login('first@example.com')).json().refreshToken;
    });

    it('issues a new pair and rotates the stored token', async () => {
      const response = await refresh(refreshToken);

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.refreshToken).not.toBe(refreshToken);

      const stored = await harness.server.repositories.users.findByEmail('first@example.com');
      expect(stored?.refreshToken).toBe(body.refreshToken);
    });

    it('revokes the stored token when a stale one is replayed', async () => {
      const rotated = (await refresh(refreshToken)).json().refreshToken;

      const replay = await refresh(refreshToken);
      expect(replay.statusCode).toBe(401);
      expect(replay.json().message).toBe('Invalid refresh token');

      expect((await refresh(rotated)).statusCode).toBe(401);
    });

    it('rejects an access token', async () => {
      const { accessToken } = (await login('first@example.com')).json();

      const response = await refresh(accessToken);

      expect(response.statusCode).toBe(401);
      expect(response.json().message).toBe('Invalid scope for token');
    });

    it('rejects garbage', async () => {
      const response = await refresh('garbage');
      expect(response.statusCode).toBe(401);
    });
  });

  describe('GET /api/users/me', () => {
    it('requires a token', async () => {
      const response = await harness.server.inject({ method: 'GET', url: '/api/users/me' });
      expect(response.statusCode).toBe(401);
    });

    it('is open to every role', async () => {
      const moderator = await harness.createUser('moderator');

      const response = await harness.server.inject({
        method: 'GET',
        url: '/api/users/me',
        headers: { authorization: harness.bearer(moderator) },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ id: moderator.id, role: 'moderator' });
    });
  });
});
