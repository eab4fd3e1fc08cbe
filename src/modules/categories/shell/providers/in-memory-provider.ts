/**
 * In-memory CategoriesProvider.
 *
 * Keeps categories in insertion order. Useful for local development, tests and
 * processes that load a fixed set of categories from a seed file.
 */

import { randomUUID } from 'node:crypto';

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { formatSchemaErrors } from '@/common/types/errors.js';

import {
  createCategoryNotFoundError,
  createProviderError,
  type CategoriesProviderError,
  type ProviderError,
} from '../../core/errors.js';
import { CategorySchema, type Category, type CreateCategoryInput } from '../../core/types.js';

import type { CategoriesProvider } from '../../core/ports.js';

const validator = TypeCompiler.Compile(CategorySchema);

/**
 * Listing with a cursor whose category no longer exists fails with a
 * ProviderError; the Kysely provider continues after that id instead.
 */
export interface InMemoryCategoriesProviderOptions {
  /** Initial categories, kept in the given order */
  categories?: readonly Category[];
  /** Generates IDs for created categories. Defaults to random UUIDs. */
  idGenerator?: () => string;
}

/**
 * Copies only the fields a Category carries, dropping undefined optionals.
 */
const toCategory = (id: string, fields: CreateCategoryInput): Category => ({
  id,
  name: fields.name,
  ...(fields.description !== undefined && { description: fields.description }),
  ...(fields.iconUrl !== undefined && { iconUrl: fields.iconUrl }),
});

const validate = (category: Category): Result<Category, ProviderError> => {
  if (!validator.Check(category)) {
    return err(
      createProviderError(
        'Invalid category',
        undefined,
        formatSchemaErrors(validator.Errors(category))
      )
    );
  }
  return ok(category);
};

export const makeInMemoryCategoriesProvider = (
  options: InMemoryCategoriesProviderOptions = {}
): CategoriesProvider => {
  const store = new Map<string, Category>();
  const nextId = options.idGenerator ?? randomUUID;

  for (const category of options.categories ?? []) {
    if (store.has(category.id)) {
      throw new Error(`Duplicate category id '${category.id}' in initial categories`);
    }
    store.set(category.id, { ...category });
  }

  return {
    list: async (limit, startAfterId): Promise<Result<Category[], ProviderError>> => {
      const all = [...store.values()];

      let start = 0;
      if (startAfterId !== undefined) {
        const index = all.findIndex((category) => category.id === startAfterId);
        if (index === -1) {
          return err(createProviderError(`Invalid cursor: no category with ID '${startAfterId}'`));
        }
        start = index + 1;
      }

      const end = limit !== undefined ? start + limit : undefined;
      return ok(all.slice(start, end).map((category) => ({ ...category })));
    },

    findById: async (id): Promise<Result<Category, CategoriesProviderError>> => {
      const category = store.get(id);
      if (category === undefined) {
        return err(createCategoryNotFoundError(id));
      }
      return ok({ ...category });
    },

    create: async (input): Promise<Result<Category, ProviderError>> => {
      const validated = validate(toCategory(nextId(), input));
      if (validated.isErr()) {
        return err(validated.error);
      }

      const category = validated.value;
      if (store.has(category.id)) {
        return err(createProviderError(`Category with ID '${category.id}' already exists`));
      }

      store.set(category.id, category);
      return ok({ ...category });
    },

    update: async (category): Promise<Result<Category, CategoriesProviderError>> => {
      if (!store.has(category.id)) {
        return err(createCategoryNotFoundError(category.id));
      }

      const validated = validate(toCategory(category.id, category));
      if (validated.isErr()) {
        return err(validated.error);
      }

      store.set(category.id, validated.value);
      return ok({ ...validated.value });
    },

    delete: async (id): Promise<Result<void, CategoriesProviderError>> => {
      if (!store.delete(id)) {
        return err(createCategoryNotFoundError(id));
      }
      return ok(undefined);
    },
  };
};
