/**
 * Kysely CategoriesProvider
 *
 * Postgres-backed implementation over the `categories` table. Listing uses
 * keyset pagination on `id`, so a cursor stays valid while rows are inserted.
 */

import { randomUUID } from 'node:crypto';

import { ok, err, type Result } from 'neverthrow';

import { createChildLogger } from '@/infra/logger/index.js';

import {
  createCategoryNotFoundError,
  createProviderError,
  type CategoriesProviderError,
  type ProviderError,
} from '../../core/errors.js';

import type { CategoriesProvider } from '../../core/ports.js';
import type { Category, CreateCategoryInput } from '../../core/types.js';
import type { CategoriesDbClient } from '@/infra/database/client.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Row type from database query.
 */
interface QueryRow {
  id: string;
  name: string;
  description: string | null;
  icon_url: string | null;
}

/**
 * Options for creating the Kysely categories provider.
 */
export interface KyselyCategoriesProviderOptions {
  db: CategoriesDbClient;
  logger: Logger;
  /** Generates IDs for created categories. Defaults to random UUIDs. */
  idGenerator?: () => string;
}

const COLUMNS = ['id', 'name', 'description', 'icon_url'] as const;

// ─────────────────────────────────────────────────────────────────────────────
// Provider Implementation
// ─────────────────────────────────────────────────────────────────────────────

class KyselyCategoriesProvider implements CategoriesProvider {
  private readonly db: CategoriesDbClient;
  private readonly log: Logger;
  private readonly nextId: () => string;

  constructor(options: KyselyCategoriesProviderOptions) {
    this.db = options.db;
    this.log = createChildLogger(options.logger, { provider: 'KyselyCategoriesProvider' });
    this.nextId = options.idGenerator ?? randomUUID;
  }

  async list(limit?: number, startAfterId?: string): Promise<Result<Category[], ProviderError>> {
    this.log.debug({ limit, startAfterId }, 'Listing categories');

    try {
      let query = this.db.selectFrom('categories').select(COLUMNS);

      if (startAfterId !== undefined) {
        query = query.where('id', '>', startAfterId);
      }

      // Order by id for deterministic keyset pagination
      query = query.orderBy('id', 'asc');

      if (limit !== undefined) {
        query = query.limit(limit);
      }

      const rows = await query.execute();
      return ok(rows.map((row) => this.mapRowToCategory(row)));
    } catch (error) {
      this.log.debug({ err: error, limit, startAfterId }, 'Failed to list categories');
      return err(createProviderError('Failed to list categories', error));
    }
  }

  async findById(id: string): Promise<Result<Category, CategoriesProviderError>> {
    this.log.debug({ categoryId: id }, 'Finding category by ID');

    try {
      const row = await this.db
        .selectFrom('categories')
        .select(COLUMNS)
        .where('id', '=', id)
        .executeTakeFirst();

      if (row === undefined) {
        this.log.debug({ categoryId: id }, 'Category not found');
        return err(createCategoryNotFoundError(id));
      }

      return ok(this.mapRowToCategory(row));
    } catch (error) {
      this.log.debug({ err: error, categoryId: id }, 'Failed to find category by ID');
      return err(createProviderError('Failed to find category by ID', error));
    }
  }

  async create(input: CreateCategoryInput): Promise<Result<Category, ProviderError>> {
    const id = this.nextId();
    this.log.debug({ categoryId: id, name: input.name }, 'Creating category');

    try {
      const row = await this.db
        .insertInto('categories')
        .values({ id, ...this.mapFieldsToRow(input) })
        .returning(COLUMNS)
        .executeTakeFirstOrThrow();

      return ok(this.mapRowToCategory(row));
    } catch (error) {
      this.log.debug({ err: error, name: input.name }, 'Failed to create category');
      return err(createProviderError('Failed to create category', error));
    }
  }

  async update(category: Category): Promise<Result<Category, CategoriesProviderError>> {
    this.log.debug({ categoryId: category.id }, 'Updating category');

    try {
      const row = await this.db
        .updateTable('categories')
        .set(this.mapFieldsToRow(category))
        .where('id', '=', category.id)
        .returning(COLUMNS)
        .executeTakeFirst();

      if (row === undefined) {
        return err(createCategoryNotFoundError(category.id));
      }

      return ok(this.mapRowToCategory(row));
    } catch (error) {
      this.log.debug({ err: error, categoryId: category.id }, 'Failed to update category');
      return err(createProviderError('Failed to update category', error));
    }
  }

  async delete(id: string): Promise<Result<void, CategoriesProviderError>> {
    this.log.debug({ categoryId: id }, 'Deleting category');

    try {
      const result = await this.db
        .deleteFrom('categories')
        .where('id', '=', id)
        .executeTakeFirst();

      if (result.numDeletedRows === 0n) {
        return err(createCategoryNotFoundError(id));
      }

      return ok(undefined);
    } catch (error) {
      this.log.debug({ err: error, categoryId: id }, 'Failed to delete category');
      return err(createProviderError('Failed to delete category', error));
    }
  }

  private mapFieldsToRow(fields: CreateCategoryInput): Omit<QueryRow, 'id'> {
    return {
      name: fields.name,
      description: fields.description ?? null,
      icon_url: fields.iconUrl ?? null,
    };
  }

  private mapRowToCategory(row: QueryRow): Category {
    return {
      id: row.id,
      name: row.name,
      ...(row.description !== null && { description: row.description }),
      ...(row.icon_url !== null && { iconUrl: row.icon_url }),
    };
  }
}

/**
 * Factory function to create a Postgres-backed CategoriesProvider.
 */
export const makeKyselyCategoriesProvider = (
  options: KyselyCategoriesProviderOptions
): CategoriesProvider => {
  return new KyselyCategoriesProvider(options);
};
