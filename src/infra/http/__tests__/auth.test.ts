import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import { buildTestApp, type TestApp } from '../../../testing/testApp.js';

describe('Auth API', () => {
  let ctx: TestApp;

  beforeEach(() => {
    ctx = buildTestApp();
  });

  describe('POST /api/v1/auth/register', () => {
    it('should register a new user', async () => {
      const response = await request(ctx.app)
        .post('/api/v1/auth/register')
        .send({ name: 'Ada Lovelace', email: 'ada@example.com', password: 'secret1' });

      expect(response.status).toBe(201);
      expect(response.body.success).toBe(true);
      expect(response.body.message).toBe('User registered successfully');
      expect(response.body.data).toMatchObject({
        id: 1,
        name: 'Ada Lovelace',
        email: 'ada@example.com',
        role: 'user',
        is_active: true,
      });
      expect(response.body.data).toHaveProperty('created_at');
      expect(response.body.data).not.toHaveProperty('password_hash');
    });

    it('should return 409 for a duplicate email', async () => {
      await ctx.seedUser('ada@example.com');

      const response = await request(ctx.app)
        .post('/api/v1/auth/register')
        .send({ name: 'Ada Again', email: 'ada@example.com', password: 'secret1' });

      expect(response.status).toBe(409);
      expect(response.body).toEqual({ success: false, message: 'email already registered' });
    });

    it('should report every missing field', async () => {
      const response = await request(ctx.app).post('/api/v1/auth/register').send({});

      expect(response.status).toBe(422);
      expect(response.body).toEqual({
        success: false,
        message: 'Validation failed',
        error: {
          name: 'This field is required',
          email: 'This field is required',
          password: 'This field is required',
        },
      });
    });

    it('should report invalid values per field', async () => {
      const response = await request(ctx.app)
        .post('/api/v1/auth/register')
        .send({ name: 'A', email: 'not-an-email', password: '123' });

      expect(response.status).toBe(422);
      expect(response.body.error).toEqual({
        name: 'Value is too short',
        email: 'Invalid email format',
        password: 'Value is too short',
      });
    });

    it('should reject malformed JSON', async () => {
      const response = await request(ctx.app)
        .post('/api/v1/auth/register')
        .set('Content-Type', 'application/json')
        .send('{"email":');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ success: false, message: 'Invalid JSON body' });
    });
  });

  describe('POST /api/v1/auth/login', () => {
    beforeEach(async () => {
      await request(ctx.app)
        .post('/api/v1/auth/register')
        .send({ name: 'Ada Lovelace', email: 'ada@example.com', password: 'secret1' });
    });

    it('should return a token that verifies to the user', async () => {
      const response = await request(ctx.app)
        .post('/api/v1/auth/login')
        .send({ email: 'ada@example.com', password: 'secret1' });

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('Login successful');
      expect(response.body.data.user.email).toBe('ada@example.com');
      expect(ctx.tokenService.verify(response.body.data.token)).toEqual({
        userId: 1,
        email: 'ada@example.com',
        role: 'user',
      });
    });

    it('should return 401 for a wrong password', async () => {
      const response = await request(ctx.app)
        .post('/api/v1/auth/login')
        .send({ email: 'ada@example.com', password: 'wrong-password' });

      expect(response.status).toBe(401);
      expect(response.body).toEqual({ success: false, message: 'invalid email or password' });
    });

    it('should return the same 401 for an unknown email', async () => {
      const response = await request(ctx.app)
        .post('/api/v1/auth/login')
        .send({ email: 'nobody@example.com', password: 'secret1' });

      expect(response.status).toBe(401);
      expect(response.body.message).toBe('invalid email or password');
    });

    it('should validate the body', async () => {
      const response = await request(ctx.app)
        .post('/api/v1/auth/login')
        .send({ email: 'ada@example.com', password: '' });

      expect(response.status).toBe(422);
      expect(response.body.error).toEqual({ password: 'This field is required' });
    });

    it('should let the token reach protected routes', async () => {
      const login = await request(ctx.app)
        .post('/api/v1/auth/login')
        .send({ email: 'ada@example.com', password: 'secret1' });

      const response = await request(ctx.app)
        .get('/api/v1/users/me')
        .set('Authorization', `Bearer ${login.body.data.token}`);

      expect(response.status).toBe(200);
      expect(response.body.data.email).toBe('ada@example.com');
    });
  });

  describe('rate limiting', () => {
    it('should throttle repeated login attempts', async () => {
      const limited = buildTestApp({ rateLimit: { loginMax: 2 } });
      const attempt = () =>
        request(limited.app).post('/api/v1/auth/login').send({ email: 'ada@example.com', password: 'x' });

      expect((await attempt()).status).toBe(401);
      expect((await attempt()).status).toBe(401);

      const response = await attempt();
      expect(response.status).toBe(429);
      expect(response.body).toEqual({
        success: false,
        message: 'Too many login attempts, please try again later.',
      });
    });

    it('should throttle the whole API per client', async () => {
      const limited = buildTestApp({ rateLimit: { max: 1 } });

      expect((await request(limited.app).get('/health')).status).toBe(200);

      const response = await request(limited.app).get('/health');
      expect(response.status).toBe(429);
      expect(response.body.message).toBe('Too many requests, please try again later.');
    });
  });
});
