/**
 * @contacts-hub/core
 * 
 * Core package containing:
 * - Database access layer
 * - Role-based access control
 * - Error handling
 * - Shared types
 */

// Types
export type {
  Contact,
  ContactInput,
} from './types/contact.js';

export {
  ROLES,
  isRole,
  toPublicUser,
  type Role,
  type User,
  type PublicUser,
  type UserCreateInput,
} from './types/user.js';

// Database
export {
  openDatabase,
  closeDatabase,
  checkDatabaseHealth,
  IN_MEMORY,
  type Database,
  type DatabaseHandle,
  type OpenDatabaseOptions,
  users,
  contacts,
  BaseRepository,
  DEFAULT_PAGE_SIZE,
  type PaginationOptions,
  UserRepository,
  ContactRepository,
} from './db/index.js';

// Access control
export {
  RoleAccess,
  allowedOperationGet,
  allowedOperationCreate,
  allowedOperationUpdate,
  allowedOperationRemove,
  type RoleSubject,
} from './services/roleAccess.js';

// Errors
export { 
  ContactsHubError,
  UnauthorizedError,
  ForbiddenError,
  NotFoundError,
  ConflictError,
} from './errors/index.js';
