/**
 * Role Access
 *
 * Authorization by role-set membership. One instance per logical operation;
 * `check` is evaluated on every request and keeps no state.
 */

import { ForbiddenError, UnauthorizedError } from '../errors/index.js';
import type { Role, User } from '../types/user.js';

export type RoleSubject = Pick<User, 'id' | 'role'>;

export class RoleAccess {
  readonly allowedRoles: readonly Role[];

  constructor(allowedRoles: readonly Role[]) {
    this.allowedRoles = Object.freeze([...allowedRoles]);
  }

  allows(role: Role): boolean {
    return this.allowedRoles.includes(role);
  }

  /**
   * Throw unless `user` holds one of the allowed roles
   */
  check(user: RoleSubject | undefined): void {
    if (!user) {
      throw new UnauthorizedError();
    }
    if (!this.allows(user.role)) {
      throw new ForbiddenError('Operation forbidden', {
        role: user.role,
        allowedRoles: [...this.allowedRoles],
      });
    }
  }
}

export const allowedOperationGet = new RoleAccess(['admin', 'moderator', 'user']);
export const allowedOperationCreate = new RoleAccess(['admin', 'moderator', 'user']);
export const allowedOperationUpdate = new RoleAccess(['admin', 'moderator']);
export const allowedOperationRemove = new RoleAccess(['admin']);
