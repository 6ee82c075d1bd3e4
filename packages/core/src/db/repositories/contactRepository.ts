/**
 * Contact Repository
 *
 * Exact-match, substring and birthday-window queries plus
 * insert/update/delete on the contacts table.
 */

import { asc, eq, inArray, sql, type SQL } from 'drizzle-orm';
import type { AnySQLiteColumn } from 'drizzle-orm/sqlite-core';
import { birthdayKeysBetween } from '@contacts-hub/utils';
import { BaseRepository, DEFAULT_PAGE_SIZE, type PaginationOptions } from '../baseRepository.js';
import type { Database } from '../client.js';
import { contacts } from '../schema.js';
import type { Contact, ContactInput } from '../../types/contact.js';

/**
 * Case-insensitive `LIKE '%term%'`, with `%`, `_` and `\` in the term taken
 * literally.
 */
function containing(column: AnySQLiteColumn, term: string): SQL {
  const pattern = `%${term.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
  return sql`${column} LIKE ${pattern} ESCAPE '\\'`;
}

export class ContactRepository extends BaseRepository {
  constructor(db: Database) {
    super('Contact', db);
  }

  async findAll(options: PaginationOptions = {}): Promise<Contact[]> {
    const { offset = 0, limit = DEFAULT_PAGE_SIZE } = options;
    return this.execute('Error listing contacts', { offset, limit }, () =>
      this.db.select().from(contacts).orderBy(asc(contacts.id)).limit(limit).offset(offset).all()
    );
  }

  async findById(id: number): Promise<Contact | null> {
    const row = await this.execute('Error finding contact by ID', { id }, () =>
      this.db.select().from(contacts).where(eq(contacts.id, id)).get()
    );
    return row ?? null;
  }

  /**
   * Exact email lookup, used for the uniqueness check
   */
  async findByEmail(email: string): Promise<Contact | null> {
    const row = await this.execute('Error finding contact by email', { email }, () =>
      this.db.select().from(contacts).where(eq(contacts.email, email.toLowerCase())).get()
    );
    return row ?? null;
  }

  async searchByFirstName(term: string): Promise<Contact[]> {
    return this.search('firstName', contacts.firstName, term);
  }

  async searchByLastName(term: string): Promise<Contact[]> {
    return this.search('lastName', contacts.lastName, term);
  }

  async searchByEmail(term: string): Promise<Contact[]> {
    return this.search('email', contacts.email, term);
  }

  /**
   * Contacts whose birthday (month and day, any year) falls in `[start, end)`,
   * soonest first.
   */
  async findBirthdaysBetween(start: Date, end: Date): Promise<Contact[]> {
    const keys = birthdayKeysBetween(start, end);
    if (keys.length === 0) {
      return [];
    }

    const monthDay = sql<string>`substr(${contacts.birthday}, 6, 5)`;
    const rows = await this.execute('Error finding upcoming birthdays', { keys }, () =>
      this.db.select().from(contacts).where(inArray(monthDay, keys)).all()
    );

    const rank = new Map<string, number>();
    keys.forEach((key, index) => rank.set(key, index));
    const position = (contact: Contact): number => rank.get(contact.birthday.slice(5)) ?? keys.length;
    return rows.sort((a, b) => position(a) - position(b) || a.id - b.id);
  }

  async create(input: ContactInput, userId: number | null): Promise<Contact> {
    const now = new Date();
    const contact = await this.execute('Error creating contact', { email: input.email }, () =>
      this.db
        .insert(contacts)
        .values({
          firstName: input.firstName,
          lastName: input.lastName,
          email: input.email.toLowerCase(),
          phone: input.phone ?? null,
          birthday: input.birthday,
          notes: input.notes ?? null,
          userId,
          createdAt: now,
          updatedAt: now,
        })
        .returning()
        .get()
    );
    this.logMutation('created', contact.id);
    return contact;
  }

  /**
   * Overwrite every writable field. Returns null when the id does not exist.
   */
  async update(id: number, input: ContactInput): Promise<Contact | null> {
    const contact = await this.execute('Error updating contact', { id, email: input.email }, () =>
      this.db
        .update(contacts)
        .set({
          firstName: input.firstName,
          lastName: input.lastName,
          email: input.email.toLowerCase(),
          phone: input.phone ?? null,
          birthday: input.birthday,
          notes: input.notes ?? null,
          updatedAt: new Date(),
        })
        .where(eq(contacts.id, id))
        .returning()
        .get()
    );
    if (!contact) {
      return null;
    }
    this.logMutation('updated', id);
    return contact;
  }

  /**
   * Delete by id. Returns the removed record, or null when the id does not exist.
   */
  async remove(id: number): Promise<Contact | null> {
    const contact = await this.execute('Error deleting contact', { id }, () =>
      this.db.delete(contacts).where(eq(contacts.id, id)).returning().get()
    );
    if (!contact) {
      return null;
    }
    this.logMutation('deleted', id);
    return contact;
  }

  async count(): Promise<number> {
    const row = await this.execute('Error counting contacts', {}, () =>
      this.db.select({ count: sql<number>`count(*)` }).from(contacts).get()
    );
    return row?.count ?? 0;
  }

  private async search(field: string, column: AnySQLiteColumn, term: string): Promise<Contact[]> {
    return this.execute('Error searching contacts', { field, term }, () =>
      this.db.select().from(contacts).where(containing(column, term)).orderBy(asc(contacts.id)).all()
    );
  }
}
