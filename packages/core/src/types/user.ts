/**
 * User Types
 */

export const ROLES = ['admin', 'moderator', 'user'] as const;

export type Role = (typeof ROLES)[number];

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && (ROLES as readonly string[]).includes(value);
}

export interface User {
  id: number;
  username: string;
  email: string;
  /** bcrypt hash */
  password: string;
  role: Role;
  refreshToken: string | null;
  createdAt: Date;
}

/** A user as it may leave the API */
export type PublicUser = Omit<User, 'password' | 'refreshToken'>;

export interface UserCreateInput {
  username: string;
  email: string;
  password: string;
  role?: Role;
}

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    role: user.role,
    createdAt: user.createdAt,
  };
}
