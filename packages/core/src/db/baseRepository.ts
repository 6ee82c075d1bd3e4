/**
 * Base Repository Pattern
 *
 * Holds the drizzle handle and runs every statement through `execute`, which
 * logs failures with the model name before rethrowing. Unique-constraint
 * violations surface as `ConflictError`. Concrete repositories write their
 * own typed queries.
 */

import type { Database } from './client.js';
import { ConflictError } from '../errors/index.js';
import { logger } from '../logger.js';

export interface PaginationOptions {
  offset?: number;
  limit?: number;
}

export const DEFAULT_PAGE_SIZE = 100;

/**
 * Column named by a SQLite unique-constraint failure
 * ("UNIQUE constraint failed: users.email"), or null for any other error
 */
function uniqueViolation(error: unknown): string | null {
  if (error instanceof Error && 'code' in error && error.code === 'SQLITE_CONSTRAINT_UNIQUE') {
    return error.message.split('.').pop() ?? null;
  }
  return null;
}

export abstract class BaseRepository {
  protected readonly modelName: string;
  protected readonly db: Database;

  constructor(modelName: string, db: Database) {
    this.modelName = modelName;
    this.db = db;
  }

  /**
   * Run a statement, logging and rethrowing whatever it throws
   */
  protected async execute<T>(
    description: string,
    context: Record<string, unknown>,
    operation: () => T
  ): Promise<T> {
    try {
      return operation();
    } catch (error) {
      const field = uniqueViolation(error);
      if (field) {
        const value = context[field];
        logger.warn({ model: this.modelName, ...context }, `${description}: duplicate ${field}`);
        throw new ConflictError(this.modelName, field, typeof value === 'string' ? value : '');
      }
      logger.error(
        { model: this.modelName, ...context, error: (error as Error).message },
        description
      );
      throw error;
    }
  }

  protected logMutation(action: 'created' | 'updated' | 'deleted', id: number): void {
    logger.info({ model: this.modelName, id }, `Record ${action}`);
  }
}
