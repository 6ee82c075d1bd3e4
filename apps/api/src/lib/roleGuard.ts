/**
 * Role guard
 *
 * Turns a RoleAccess rule into a preHandler. Runs after `authenticate`, so
 * `request.authUser` is already resolved.
 */

import type { FastifyRequest } from 'fastify';
import { ForbiddenError, type RoleAccess } from '@contacts-hub/core';

export function roleGuard(access: RoleAccess) {
  return async (request: FastifyRequest): Promise<void> => {
    try {
      access.check(request.authUser);
    } catch (error) {
      if (error instanceof ForbiddenError) {
        request.log.warn(
          {
            route: request.routeOptions.url,
            userId: request.authUser?.id,
            role: request.authUser?.role,
          },
          'Role not permitted'
        );
      }
      throw error;
    }
  };
}
