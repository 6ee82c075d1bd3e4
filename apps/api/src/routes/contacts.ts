/**
 * Contact Routes
 *
 * CRUD, search and upcoming-birthday queries. Every route requires a bearer
 * token; each one is additionally gated by the RoleAccess rule of its
 * operation.
 */

import type { FastifyPluginAsync } from 'fastify';
import {
  allowedOperationCreate,
  allowedOperationGet,
  allowedOperationRemove,
  allowedOperationUpdate,
  ConflictError,
  NotFoundError,
  type Contact,
} from '@contacts-hub/core';
import { addDays, toIsoDate } from '@contacts-hub/utils';
import { roleGuard } from '../lib/roleGuard.js';
import {
  contactBodySchema,
  contactIdParamsSchema,
  emailParamsSchema,
  firstNameParamsSchema,
  lastNameParamsSchema,
  listContactsQuerySchema,
} from '../schemas/contact.js';

/** Days covered by the birthday query, today included */
export const BIRTHDAY_WINDOW_DAYS = 7;

const security = [{ bearerAuth: [] }];

function found(contacts: Contact[], identifier: string): Contact[] {
  if (contacts.length === 0) {
    throw new NotFoundError('Contact', identifier);
  }
  return contacts;
}

export const contactRoutes: FastifyPluginAsync = async (fastify) => {
  const { contacts } = fastify.repositories;

  // Require authentication for all contact routes
  fastify.addHook('onRequest', fastify.authenticate);

  /**
   * List contacts
   */
  fastify.get('/', {
    schema: {
      description: 'Return contacts',
      tags: ['Contacts'],
      security,
    },
    preHandler: roleGuard(allowedOperationGet),
  }, async (request) => {
    const query = listContactsQuerySchema.parse(request.query);
    return contacts.findAll(query);
  });

  /**
   * Get contact by ID
   */
  fastify.get('/search_by_id/:id', {
    schema: {
      description: 'Get a contact by ID',
      tags: ['Contacts'],
      security,
    },
    preHandler: roleGuard(allowedOperationGet),
  }, async (request) => {
    const { id } = contactIdParamsSchema.parse(request.params);

    const contact = await contacts.findById(id);
    if (!contact) {
      throw new NotFoundError('Contact', id);
    }
    return contact;
  });

  fastify.get('/search_by_last_name/:last_name', {
    schema: {
      description: 'Search contacts by last name',
      tags: ['Contacts'],
      security,
    },
    preHandler: roleGuard(allowedOperationGet),
  }, async (request) => {
    const { last_name } = lastNameParamsSchema.parse(request.params);
    return found(await contacts.searchByLastName(last_name), last_name);
  });

  fastify.get('/search_by_first_name/:first_name', {
    schema: {
      description: 'Search contacts by first name',
      tags: ['Contacts'],
      security,
    },
    preHandler: roleGuard(allowedOperationGet),
  }, async (request) => {
    const { first_name } = firstNameParamsSchema.parse(request.params);
    return found(await contacts.searchByFirstName(first_name), first_name);
  });

  fastify.get('/search_by_email/:email', {
    schema: {
      description: 'Search contacts by email',
      tags: ['Contacts'],
      security,
    },
    preHandler: roleGuard(allowedOperationGet),
  }, async (request) => {
    const { email } = emailParamsSchema.parse(request.params);
    return found(await contacts.searchByEmail(email), email);
  });

  /**
   * Create a contact
   */
  fastify.post('/', {
    schema: {
      description: 'Create a contact',
      tags: ['Contacts'],
      security,
    },
    preHandler: roleGuard(allowedOperationCreate),
  }, async (request, reply) => {
    const input = contactBodySchema.parse(request.body);

    const existing = await contacts.findByEmail(input.email);
    if (existing) {
      throw new ConflictError('Contact', 'email', input.email);
    }

    const contact = await contacts.create(input, request.authUser?.id ?? null);
    return reply.status(201).send(contact);
  });

  /**
   * Replace a contact
   */
  fastify.put('/:id', {
    schema: {
      description: 'Update a contact. Only moderators and admins',
      tags: ['Contacts'],
      security,
    },
    preHandler: roleGuard(allowedOperationUpdate),
  }, async (request) => {
    const { id } = contactIdParamsSchema.parse(request.params);
    const input = contactBodySchema.parse(request.body);

    if (!(await contacts.findById(id))) {
      throw new NotFoundError('Contact', id);
    }

    const owner = await contacts.findByEmail(input.email);
    if (owner && owner.id !== id) {
      throw new ConflictError('Contact', 'email', input.email);
    }

    const contact = await contacts.update(id, input);
    if (!contact) {
      throw new NotFoundError('Contact', id);
    }
    return contact;
  });

  /**
   * Delete a contact
   */
  fastify.delete('/:id', {
    schema: {
      description: 'Delete a contact. Only admins',
      tags: ['Contacts'],
      security,
    },
    preHandler: roleGuard(allowedOperationRemove),
  }, async (request, reply) => {
    const { id } = contactIdParamsSchema.parse(request.params);

    const contact = await contacts.remove(id);
    if (!contact) {
      throw new NotFoundError('Contact', id);
    }

    request.log.info({ contactId: id, userId: request.authUser?.id }, 'Contact removed');
    return reply.status(204).send();
  });

  /**
   * Birthdays in the coming week
   */
  fastify.get('/birthdays', {
    schema: {
      description: 'Upcoming birthdays',
      tags: ['Contacts'],
      security,
    },
    preHandler: roleGuard(allowedOperationGet),
  }, async (request) => {
    const today = addDays(new Date(), 0);
    const end = addDays(today, BIRTHDAY_WINDOW_DAYS);
    request.log.debug({ from: toIsoDate(today), until: toIsoDate(end) }, 'Birthday window');
    return contacts.findBirthdaysBetween(today, end);
  });
};
