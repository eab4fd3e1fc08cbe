/**
 * Port interfaces for the Categories module.
 *
 * CategoriesProvider is the storage contract the shell layer must implement.
 * CategoriesRepository is the contract exposed to business logic.
 */

import type {
  CategoriesProviderError,
  CategoryNotFoundError,
  CreateCategoryError,
  DeleteCategoryError,
  GetCategoryError,
  ListCategoriesError,
  ProviderError,
  UpdateCategoryError,
} from './errors.js';
import type {
  Category,
  CreateCategoryInput,
  ListCategoriesInput,
  PaginatedResponse,
} from './types.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Provider
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Storage backend for categories.
 *
 * Expected failures are returned, never thrown. Lookups and writes on a single
 * ID distinguish CategoryNotFoundError from every other failure.
 */
export interface CategoriesProvider {
  /**
   * List categories in a stable order.
   *
   * @param limit - Maximum number of items; undefined means no limit
   * @param startAfterId - Return items after this ID; undefined means from the start
   */
  list(limit?: number, startAfterId?: string): Promise<Result<Category[], ProviderError>>;

  findById(id: string): Promise<Result<Category, CategoriesProviderError>>;

  /**
   * Create a category. The provider assigns the ID.
   */
  create(input: CreateCategoryInput): Promise<Result<Category, ProviderError>>;

  /**
   * Replace the stored fields of the category identified by `category.id`.
   */
  update(category: Category): Promise<Result<Category, CategoriesProviderError>>;

  delete(id: string): Promise<Result<void, CategoriesProviderError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Repository
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Category data access for business logic.
 */
export interface CategoriesRepository {
  listCategories(
    input?: ListCategoriesInput
  ): Promise<Result<PaginatedResponse<Category>, ListCategoriesError>>;

  getCategory(id: string): Promise<Result<Category, CategoryNotFoundError | GetCategoryError>>;

  createCategory(input: CreateCategoryInput): Promise<Result<Category, CreateCategoryError>>;

  updateCategory(
    category: Category
  ): Promise<Result<Category, CategoryNotFoundError | UpdateCategoryError>>;

  deleteCategory(id: string): Promise<Result<void, CategoryNotFoundError | DeleteCategoryError>>;
}
