/**
 * User Repository
 * 
 * Lookups used by authentication and the account endpoints.
 */

import { eq, sql } from 'drizzle-orm';
import { BaseRepository } from '../baseRepository.js';
import type { Database } from '../client.js';
import { users } from '../schema.js';
import type { Role, User, UserCreateInput } from '../../types/user.js';

export class UserRepository extends BaseRepository {
  constructor(db: Database) {
    super('User', db);
  }

  async findById(id: number): Promise<User | null> {
    const row = await this.execute('Error finding user by ID', { id }, () =>
      this.db.select().from(users).where(eq(users.id, id)).get()
    );
    return row ?? null;
  }

  /**
   * Find user by email (case-insensitive; emails are stored lower-cased)
   */
  async findByEmail(email: string): Promise<User | null> {
    const row = await this.execute('Error finding user by email', { email }, () =>
      this.db.select().from(users).where(eq(users.email, email.toLowerCase())).get()
    );
    return row ?? null;
  }

  /**
   * Create a user. `password` must already be hashed.
   */
  async create(input: UserCreateInput): Promise<User> {
    const user = await this.execute('Error creating user', { email: input.email }, () =>
      this.db
        .insert(users)
        .values({
          username: input.username,
          email: input.email.toLowerCase(),
          password: input.password,
          role: input.role ?? 'user',
          createdAt: new Date(),
        })
        .returning()
        .get()
    );
    this.logMutation('created', user.id);
    return user;
  }

  /**
   * Register an account: the email check, the first-account test and the
   * insert run in one transaction. The first account becomes an admin, later
   * ones users. Returns null when the email is already registered.
   */
  async register(input: Omit<UserCreateInput, 'role'>): Promise<User | null> {
    const email = input.email.toLowerCase();
    const user = await this.execute('Error registering user', { email }, () =>
      this.db.transaction((tx) => {
        const taken = tx.select({ id: users.id }).from(users).where(eq(users.email, email)).get();
        if (taken) {
          return null;
        }

        const existing = tx.select({ count: sql<number>`count(*)` }).from(users).get();
        return tx
          .insert(users)
          .values({
            username: input.username,
            email,
            password: input.password,
            role: (existing?.count ?? 0) === 0 ? 'admin' : 'user',
            createdAt: new Date(),
          })
          .returning()
          .get();
      }, { behavior: 'immediate' })
    );
    if (user) {
      this.logMutation('created', user.id);
    }
    return user;
  }

  /**
   * Store or clear the refresh token issued to a user
   */
  async updateRefreshToken(id: number, refreshToken: string | null): Promise<void> {
    await this.execute('Error updating refresh token', { id }, () =>
      this.db.update(users).set({ refreshToken }).where(eq(users.id, id)).run()
    );
  }

  /**
   * Count users holding a role
   */
  async countByRole(role: Role): Promise<number> {
    const row = await this.execute('Error counting users by role', { role }, () =>
      this.db.select({ count: sql<number>`count(*)` }).from(users).where(eq(users.role, role)).get()
    );
    return row?.count ?? 0;
  }
}
