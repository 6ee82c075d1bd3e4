/**
 * Database Schema
 *
 * Table definitions shared by the drizzle query builder and the bootstrap DDL
 * in client.ts. Keep both in step.
 */

import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import { ROLES } from '../types/user.js';

export const users = sqliteTable('users', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  username: text('username').notNull(),
  email: text('email').notNull().unique(),
  password: text('password').notNull(),
  role: text('role', { enum: ROLES }).notNull().default('user'),
  refreshToken: text('refresh_token'),
  createdAt: integer('created_at', { mode: 'timestamp' })
    .notNull()
    .$defaultFn(() => new Date()),
});

export const contacts = sqliteTable(
  'contacts',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    firstName: text('first_name').notNull(),
    lastName: text('last_name').notNull(),
    email: text('email').notNull().unique(),
    phone: text('phone'),
    birthday: text('birthday').notNull(),
    notes: text('notes'),
    userId: integer('user_id').references(() => users.id, { onDelete: 'set null' }),
    createdAt: integer('created_at', { mode: 'timestamp' })
      .notNull()
      .$defaultFn(() => new Date()),
    updatedAt: integer('updated_at', { mode: 'timestamp' })
      .notNull()
      .$defaultFn(() => new Date()),
  },
  (table) => ({
    firstNameIdx: index('contacts_first_name_idx').on(table.firstName),
    lastNameIdx: index('contacts_last_name_idx').on(table.lastName),
  }),
);
