import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { openDatabase, closeDatabase, IN_MEMORY, type DatabaseHandle } from '../client.js';
import { ContactRepository } from './contactRepository.js';
import { UserRepository } from './userRepository.js';
import { ConflictError } from '../../errors/index.js';
import type { ContactInput } from '../../types/contact.js';

function input(overrides: Partial<ContactInput> = {}): ContactInput {
  return {
    firstName: 'Ada',
    lastName: 'Lovelace',
    email: 'ada@example.com',
    phone: '+44 20 0000 0000',
    birthday: '1815-12-10',
    notes: null,
    ...overrides,
  };
}

describe('ContactRepository', () => {
  let handle: DatabaseHandle;
  let repository: ContactRepository;

  beforeEach(() => {
    handle = openDatabase(IN_MEMORY);
    repository = new ContactRepository(handle.db);
  });

  afterEach(() => {
    closeDatabase(handle);
  });

  describe('create / findById', () => {
    it('round-trips a contact', async () => {
      const created = await repository.create(input(), null);

      expect(created.id).toBe(1);
      expect(created).toMatchObject({
        firstName: 'Ada',
        lastName: 'Lovelace',
        email: 'ada@example.com',
        phone: '+44 20 0000 0000',
        birthday: '1815-12-10',
        notes: null,
        userId: null,
      });
      expect(await repository.findById(created.id)).toEqual(created);
    });

    it('stores the email lower-cased', async () => {
      const created = await repository.create(input({ email: 'Ada@Example.COM' }), null);
      expect(created.email).toBe('ada@example.com');
    });

    it('defaults optional fields to null', async () => {
      const created = await repository.create(
        { firstName: 'Alan', lastName: 'Turing', email: 'alan@example.com', birthday: '1912-06-23' },
        null
      );
      expect(created.phone).toBeNull();
      expect(created.notes).toBeNull();
    });

    it('records the creating user', async () => {
      const users = new UserRepository(handle.db);
      const owner = await users.create({ username: 'owner', email: 'owner@example.com', password: 'hash' });

      const created = await repository.create(input(), owner.id);
      expect(created.userId).toBe(owner.id);
    });

    it('turns a duplicate email at the table level into a ConflictError', async () => {
      await repository.create(input(), null);

      const attempt = repository.create(input({ firstName: 'Other' }), null);

      await expect(attempt).rejects.toBeInstanceOf(ConflictError);
      await expect(attempt).rejects.toMatchObject({
        statusCode: 409,
        message: 'Contact with this email already exists',
        details: { resource: 'Contact', field: 'email', value: 'ada@example.com' },
      });
      expect(await repository.count()).toBe(1);
    });

    it('returns null for an unknown id', async () => {
      expect(await repository.findById(42)).toBeNull();
    });
  });

  describe('findByEmail', () => {
    it('matches exactly, ignoring case', async () => {
      await repository.create(input(), null);
      expect((await repository.findByEmail('ADA@example.com'))?.firstName).toBe('Ada');
      expect(await repository.findByEmail('ada@example')).toBeNull();
    });
  });

  describe('findAll', () => {
    it('returns an empty list for an empty table', async () => {
      expect(await repository.findAll()).toEqual([]);
    });

    it('orders by id and honours offset and limit', async () => {
      for (const name of ['a', 'b', 'c', 'd']) {
        await repository.create(input({ firstName: name, email: `${name}@example.com` }), null);
      }

      const page = await repository.findAll({ offset: 1, limit: 2 });
      expect(page.map((c) => c.firstName)).toEqual(['b', 'c']);
    });
  });

  describe('search', () => {
    beforeEach(async () => {
      await repository.create(input(), null);
      await repository.create(
        input({ firstName: 'Adam', lastName: 'Smith', email: 'adam.smith@example.org' }),
        null
      );
      await repository.create(
        input({ firstName: 'Grace', lastName: 'Hopper', email: 'grace_h@navy.example' }),
        null
      );
    });

    it('finds first names by case-insensitive substring', async () => {
      const result = await repository.searchByFirstName('ad');
      expect(result.map((c) => c.firstName)).toEqual(['Ada', 'Adam']);
    });

    it('finds last names by substring', async () => {
      const result = await repository.searchByLastName('opp');
      expect(result.map((c) => c.lastName)).toEqual(['Hopper']);
    });

    it('finds emails by substring', async () => {
      const result = await repository.searchByEmail('example.org');
      expect(result.map((c) => c.email)).toEqual(['adam.smith@example.org']);
    });

    it('treats LIKE wildcards in the term literally', async () => {
      expect((await repository.searchByEmail('_h@')).map((c) => c.firstName)).toEqual(['Grace']);
      expect(await repository.searchByEmail('%')).toEqual([]);
    });

    it('returns an empty list when nothing matches', async () => {
      expect(await repository.searchByLastName('zzz')).toEqual([]);
    });
  });

  describe('update', () => {
    it('overwrites every field', async () => {
      const created = await repository.create(input({ notes: 'met at a conference' }), null);

      const updated = await repository.update(created.id, {
        firstName: 'Augusta',
        lastName: 'King',
        email: 'augusta@example.com',
        birthday: '1815-12-10',
      });

      expect(updated).toMatchObject({
        id: created.id,
        firstName: 'Augusta',
        lastName: 'King',
        email: 'augusta@example.com',
        phone: null,
        notes: null,
      });
      expect(await repository.findById(created.id)).toEqual(updated);
    });

    it('returns null for an unknown id', async () => {
      expect(await repository.update(99, input())).toBeNull();
    });

    it('rejects taking over another contact\'s email with a ConflictError', async () => {
      await repository.create(input(), null);
      const other = await repository.create(input({ email: 'grace@example.com' }), null);

      await expect(repository.update(other.id, input())).rejects.toMatchObject({
        statusCode: 409,
        details: { field: 'email', value: 'ada@example.com' },
      });
      expect((await repository.findById(other.id))?.email).toBe('grace@example.com');
    });
  });

  describe('remove', () => {
    it('deletes and returns the record', async () => {
      const created = await repository.create(input(), null);

      const removed = await repository.remove(created.id);
      expect(removed).toEqual(created);
      expect(await repository.findById(created.id)).toBeNull();
    });

    it('returns null and leaves the table alone for an unknown id', async () => {
      await repository.create(input(), null);

      expect(await repository.remove(99)).toBeNull();
      expect(await repository.count()).toBe(1);
    });
  });

  describe('findBirthdaysBetween', () => {
    async function addBirthday(name: string, birthday: string): Promise<void> {
      await repository.create(input({ firstName: name, email: `${name}@example.com`, birthday }), null);
    }

    it('matches month and day in a half-open window, soonest first', async () => {
      await addBirthday('seventh', '1990-01-07');
      await addBirthday('first', '1985-01-01');
      await addBirthday('eighth', '1970-01-08');
      await addBirthday('lastyear', '2000-12-31');
      await addBirthday('third', '2001-01-03');

      const result = await repository.findBirthdaysBetween(new Date(2024, 0, 1), new Date(2024, 0, 8));
      expect(result.map((c) => c.firstName)).toEqual(['first', 'third', 'seventh']);
    });

    it('wraps around the end of the year', async () => {
      await addBirthday('newyear', '1992-01-02');
      await addBirthday('eve', '1980-12-31');
      await addBirthday('summer', '1980-07-01');

      const result = await repository.findBirthdaysBetween(new Date(2024, 11, 29), new Date(2025, 0, 5));
      expect(result.map((c) => c.firstName)).toEqual(['eve', 'newyear']);
    });

    it('includes Feb 29 birthdays in a non-leap year', async () => {
      await addBirthday('leapling', '2000-02-29');
      await addBirthday('march', '1999-03-01');

      const result = await repository.findBirthdaysBetween(new Date(2023, 1, 27), new Date(2023, 2, 6));
      expect(result.map((c) => c.firstName)).toEqual(['leapling', 'march']);
    });

    it('orders same-day birthdays by id', async () => {
      await addBirthday('b', '1990-05-05');
      await addBirthday('a', '1991-05-05');

      const result = await repository.findBirthdaysBetween(new Date(2024, 4, 5), new Date(2024, 4, 12));
      expect(result.map((c) => c.firstName)).toEqual(['b', 'a']);
    });

    it('returns an empty list when no birthday falls in the window', async () => {
      await addBirthday('summer', '1980-07-01');
      expect(await repository.findBirthdaysBetween(new Date(2024, 0, 1), new Date(2024, 0, 8))).toEqual([]);
    });
  });
});
