/**
 * Authentication Routes
 * 
 * Sign-up, login and token refresh.
 */

import type { FastifyPluginAsync } from 'fastify';
import { ConflictError, toPublicUser, UnauthorizedError } from '@contacts-hub/core';
import { hashPassword, verifyPassword } from '../lib/password.js';
import { loginSchema, refreshSchema, signupSchema } from '../schemas/auth.js';

const tokenResponse = {
  200: {
    type: 'object',
    properties: {
      accessToken: { type: 'string' },
      refreshToken: { type: 'string' },
      tokenType: { type: 'string' },
    },
  },
};

export const authRoutes: FastifyPluginAsync = async (fastify) => {
  const { users } = fastify.repositories;

  /**
   * Register a new account. The first account becomes an admin.
   */
  fastify.post('/signup', {
    schema: {
      description: 'Create an account',
      tags: ['Authentication'],
      body: {
        type: 'object',
        required: ['username', 'email', 'password'],
        properties: {
          username: { type: 'string' },
          email: { type: 'string' },
          password: { type: 'string' },
        },
      },
    },
  }, async (request, reply) => {
    const body = signupSchema.parse(request.body);
    const password = await hashPassword(body.password);

    const user = await users.register({ username: body.username, email: body.email, password });
    if (!user) {
      throw new ConflictError('Account', 'email', body.email);
    }

    request.log.info({ userId: user.id, role: user.role }, 'Account created');
    return reply.status(201).send(toPublicUser(user));
  });

  /**
   * Login
   */
  fastify.post('/login', {
    schema: {
      description: 'Authenticate and get JWT tokens',
      tags: ['Authentication'],
      body: {
        type: 'object',
        required: ['email', 'password'],
        properties: {
          email: { type: 'string' },
          password: { type: 'string' },
        },
      },
      response: tokenResponse,
    },
  }, async (request) => {
    const body = loginSchema.parse(request.body);

    const user = await users.findByEmail(body.email);
    if (!user || !(await verifyPassword(body.password, user.password))) {
      throw new UnauthorizedError('Invalid email or password');
    }

    const tokens = fastify.issueTokens(user.email);
    await users.updateRefreshToken(user.id, tokens.refreshToken);

    return tokens;
  });

  /**
   * Refresh token
   */
  fastify.post('/refresh_token', {
    schema: {
      description: 'Exchange a refresh token for a new token pair',
      tags: ['Authentication'],
      body: {
        type: 'object',
        required: ['refreshToken'],
        properties: {
          refreshToken: { type: 'string' },
        },
      },
      response: tokenResponse,
    },
  }, async (request) => {
    const body = refreshSchema.parse(request.body);
    const payload = fastify.verifyRefreshToken(body.refreshToken);

    const user = await users.findByEmail(payload.sub);
    if (!user) {
      throw new UnauthorizedError();
    }

    if (user.refreshToken !== body.refreshToken) {
      // A stale or foreign token: revoke whatever is stored
      await users.updateRefreshToken(user.id, null);
      throw new UnauthorizedError('Invalid refresh token');
    }

    const tokens = fastify.issueTokens(user.email);
    await users.updateRefreshToken(user.id, tokens.refreshToken);

    return tokens;
  });
};
