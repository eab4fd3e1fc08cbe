/**
 * Categories Repository
 *
 * Facade over an injected CategoriesProvider. Each method makes exactly one
 * provider call and returns a Result; nothing is thrown for provider failures.
 */

import { createChildLogger, createSilentLogger } from '@/infra/logger/index.js';

import { createCategory } from '../../core/usecases/create-category.js';
import { deleteCategory } from '../../core/usecases/delete-category.js';
import { getCategory } from '../../core/usecases/get-category.js';
import { listCategories } from '../../core/usecases/list-categories.js';
import { updateCategory } from '../../core/usecases/update-category.js';

import type {
  CategoryError,
  CategoryNotFoundError,
  CreateCategoryError,
  DeleteCategoryError,
  GetCategoryError,
  ListCategoriesError,
  UpdateCategoryError,
} from '../../core/errors.js';
import type { CategoriesProvider, CategoriesRepository } from '../../core/ports.js';
import type {
  Category,
  CreateCategoryInput,
  ListCategoriesInput,
  PaginatedResponse,
} from '../../core/types.js';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Options for creating the categories repository.
 */
export interface CategoriesRepositoryOptions {
  provider: CategoriesProvider;
  logger?: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Repository Implementation
// ─────────────────────────────────────────────────────────────────────────────

class ProviderCategoriesRepository implements CategoriesRepository {
  private readonly deps: { readonly categoriesProvider: CategoriesProvider };
  private readonly log: Logger;

  constructor(options: CategoriesRepositoryOptions) {
    this.deps = { categoriesProvider: options.provider };
    this.log = createChildLogger(options.logger ?? createSilentLogger(), {
      repo: 'CategoriesRepository',
    });
  }

  async listCategories(
    input: ListCategoriesInput = {}
  ): Promise<Result<PaginatedResponse<Category>, ListCategoriesError>> {
    const { limit, startAfterId } = input;
    this.log.debug({ limit, startAfterId }, 'Listing categories');

    const result = await listCategories(this.deps, input);
    if (result.isErr()) {
      this.logFailure(result.error, { limit, startAfterId });
    } else {
      this.log.debug(
        { count: result.value.items.length, cursor: result.value.cursor },
        'Categories listed'
      );
    }

    return result;
  }

  async getCategory(id: string): Promise<Result<Category, CategoryNotFoundError | GetCategoryError>> {
    this.log.debug({ categoryId: id }, 'Getting category');

    const result = await getCategory(this.deps, id);
    if (result.isErr()) {
      this.logFailure(result.error, { categoryId: id });
    }

    return result;
  }

  async createCategory(input: CreateCategoryInput): Promise<Result<Category, CreateCategoryError>> {
    this.log.debug({ name: input.name }, 'Creating category');

    const result = await createCategory(this.deps, input);
    if (result.isErr()) {
      this.logFailure(result.error, { name: input.name });
    } else {
      this.log.debug({ categoryId: result.value.id }, 'Category created');
    }

    return result;
  }

  async updateCategory(
    category: Category
  ): Promise<Result<Category, CategoryNotFoundError | UpdateCategoryError>> {
    this.log.debug({ categoryId: category.id }, 'Updating category');

    const result = await updateCategory(this.deps, category);
    if (result.isErr()) {
      this.logFailure(result.error, { categoryId: category.id });
    }

    return result;
  }

  async deleteCategory(
    id: string
  ): Promise<Result<void, CategoryNotFoundError | DeleteCategoryError>> {
    this.log.debug({ categoryId: id }, 'Deleting category');

    const result = await deleteCategory(this.deps, id);
    if (result.isErr()) {
      this.logFailure(result.error, { categoryId: id });
    }

    return result;
  }

  /**
   * Not-found is an expected outcome and stays at debug level.
   */
  private logFailure(error: CategoryError, context: Record<string, unknown>): void {
    if (error.type === 'CategoryNotFoundError') {
      this.log.debug({ ...context, categoryId: error.id }, error.message);
      return;
    }

    this.log.error({ ...context, err: error.cause, errorType: error.type }, error.message);
  }
}

/**
 * Factory function to create a CategoriesRepository.
 *
 * @param options - Provider to delegate to, and an optional logger
 * @returns Repository implementation
 */
export const makeCategoriesRepository = (
  options: CategoriesRepositoryOptions
): CategoriesRepository => {
  return new ProviderCategoriesRepository(options);
};
