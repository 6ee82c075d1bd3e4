/**
 * User Routes
 */

import type { FastifyPluginAsync } from 'fastify';
import { UnauthorizedError } from '@contacts-hub/core';

export const userRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.addHook('onRequest', fastify.authenticate);

  /**
   * Current account
   */
  fastify.get('/me', {
    schema: {
      description: 'Return the authenticated user',
      tags: ['Users'],
      security: [{ bearerAuth: [] }],
    },
  }, async (request) => {
    if (!request.authUser) {
      throw new UnauthorizedError();
    }
    return request.authUser;
  });
};
