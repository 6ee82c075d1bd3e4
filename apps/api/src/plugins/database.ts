/**
 * Database Plugin
 *
 * Shares one SQLite handle and its repositories with every route, and closes
 * the handle when the server shuts down.
 */

import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import {
  closeDatabase,
  ContactRepository,
  UserRepository,
  type DatabaseHandle,
} from '@contacts-hub/core';

export interface Repositories {
  users: UserRepository;
  contacts: ContactRepository;
}

export interface DatabasePluginOptions {
  handle: DatabaseHandle;
}

declare module 'fastify' {
  interface FastifyInstance {
    db: DatabaseHandle;
    repositories: Repositories;
  }
}

const databasePlugin: FastifyPluginAsync<DatabasePluginOptions> = async (fastify, options) => {
  const { handle } = options;

  fastify.decorate('db', handle);
  fastify.decorate('repositories', {
    users: new UserRepository(handle.db),
    contacts: new ContactRepository(handle.db),
  });

  fastify.addHook('onClose', async () => {
    closeDatabase(handle);
  });
};

export const database = fp(databasePlugin, {
  name: 'database',
});
