/**
 * Test harness
 *
 * Builds the real server over an in-memory database and hands out bearer
 * tokens for seeded accounts.
 */

import type { FastifyInstance } from 'fastify';
import {
  openDatabase,
  IN_MEMORY,
  type ContactInput,
  type DatabaseHandle,
  type Role,
  type User,
} from '@contacts-hub/core';
import { createServer } from '../server.js';

export interface TestHarness {
  server: FastifyInstance;
  handle: DatabaseHandle;
  /** Create an account with the given role (no usable password) */
  createUser(role: Role, email?: string): Promise<User>;
  /** `Authorization` header value carrying a fresh access token */
  bearer(user: Pick<User, 'email'>): string;
  close(): Promise<void>;
}

export async function buildHarness(): Promise<TestHarness> {
  const handle = openDatabase(IN_MEMORY);
  const server = await createServer({ database: handle });
  await server.ready();

  return {
    server,
    handle,
    createUser: (role, email = `${role}@example.com`) =>
      server.repositories.users.create({
        username: role,
        email,
        password: 'not-a-bcrypt-hash',
        role,
      }),
    bearer: (user) => `Bearer ${server.issueTokens(user.email).accessToken}`,
    close: () => server.close(),
  };
}

export function contactInput(overrides: Partial<ContactInput> = {}): ContactInput {
  return {
    firstName: 'Ada',
    lastName: 'Lovelace',
    email: 'ada@example.com',
    phone: '+44 20 0000 0000',
    birthday: '1815-12-10',
    notes: 'Analytical engine',
    ...overrides,
  };
}
