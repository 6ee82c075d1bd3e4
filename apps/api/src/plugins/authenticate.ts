/**
 * Authentication Plugin
 * 
 * Resolves the bearer JWT of a request to the stored user, and issues the
 * access/refresh token pairs handed out by the auth routes.
 */

import { randomUUID } from 'node:crypto';
import type { FastifyPluginAsync, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import { toPublicUser, UnauthorizedError, type PublicUser } from '@contacts-hub/core';
import { isNonEmptyString } from '@contacts-hub/utils';
import { config } from '../config/index.js';

export type TokenScope = 'access_token' | 'refresh_token';

export interface TokenPayload {
  /** User email */
  sub: string;
  scope: TokenScope;
  jti: string;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  tokenType: 'bearer';
}

declare module '@fastify/jwt' {
  interface FastifyJWT {
    payload: TokenPayload;
    user: TokenPayload;
  }
}

declare module 'fastify' {
  interface FastifyRequest {
    authUser?: PublicUser;
  }
  
  interface FastifyInstance {
    authenticate: (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
    issueTokens: (email: string) => TokenPair;
    verifyRefreshToken: (token: string) => TokenPayload;
  }
}

const authenticatePlugin: FastifyPluginAsync = async (fastify) => {
  // Bearer access token (required)
  fastify.decorate('authenticate', async (request: FastifyRequest, _reply: FastifyReply) => {
    let payload: TokenPayload;
    try {
      payload = await request.jwtVerify<TokenPayload>();
    } catch (err) {
      request.log.debug({ err }, 'Access token rejected');
      throw new UnauthorizedError();
    }

    if (payload.scope !== 'access_token' || !isNonEmptyString(payload.sub)) {
      throw new UnauthorizedError('Invalid scope for token');
    }

    const user = await fastify.repositories.users.findByEmail(payload.sub);
    if (!user) {
      throw new UnauthorizedError();
    }

    request.authUser = toPublicUser(user);
  });

  fastify.decorate('issueTokens', (email: string): TokenPair => ({
    accessToken: fastify.jwt.sign(
      { sub: email, scope: 'access_token', jti: randomUUID() },
      { expiresIn: config.accessTokenExpiresIn }
    ),
    refreshToken: fastify.jwt.sign(
      { sub: email, scope: 'refresh_token', jti: randomUUID() },
      { expiresIn: config.refreshTokenExpiresIn }
    ),
    tokenType: 'bearer',
  }));

  fastify.decorate('verifyRefreshToken', (token: string): TokenPayload => {
    let payload: TokenPayload;
    try {
      payload = fastify.jwt.verify<TokenPayload>(token);
    } catch (err) {
      fastify.log.debug({ err }, 'Refresh token rejected');
      throw new UnauthorizedError();
    }

    if (payload.scope !== 'refresh_token' || !isNonEmptyString(payload.sub)) {
      throw new UnauthorizedError('Invalid scope for token');
    }
    return payload;
  });
};

export const authenticate = fp(authenticatePlugin, {
  name: 'authenticate',
  dependencies: ['@fastify/jwt', 'database'],
});
