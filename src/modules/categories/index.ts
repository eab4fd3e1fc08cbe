/**
 * Categories Module - Public API
 *
 * Repository facade over a pluggable provider, with cursor pagination and a
 * closed set of error kinds.
 */

// =============================================================================
// Repository
// =============================================================================
export {
  makeCategoriesRepository,
  type CategoriesRepositoryOptions,
} from './shell/repo/categories-repository.js';
export type { CategoriesProvider, CategoriesRepository } from './core/ports.js';

// =============================================================================
// Providers
// =============================================================================
export {
  makeInMemoryCategoriesProvider,
  type InMemoryCategoriesProviderOptions,
} from './shell/providers/in-memory-provider.js';
export {
  makeKyselyCategoriesProvider,
  type KyselyCategoriesProviderOptions,
} from './shell/providers/kysely-provider.js';
export {
  loadCategorySeed,
  CategorySeedFileSchema,
  type CategorySeedError,
} from './shell/providers/seed-loader.js';

// =============================================================================
// Use Cases
// =============================================================================
export { listCategories, type ListCategoriesDeps } from './core/usecases/list-categories.js';
export { getCategory, type GetCategoryDeps } from './core/usecases/get-category.js';
export { createCategory, type CreateCategoryDeps } from './core/usecases/create-category.js';
export { updateCategory, type UpdateCategoryDeps } from './core/usecases/update-category.js';
export { deleteCategory, type DeleteCategoryDeps } from './core/usecases/delete-category.js';
export { toPaginatedResponse } from './core/logic.js';

// =============================================================================
// Types
// =============================================================================
export type {
  Category,
  CategoryDTO,
  CreateCategoryInput,
  ListCategoriesInput,
  PaginatedResponse,
} from './core/types.js';
export { CategorySchema } from './core/types.js';

// =============================================================================
// Errors
// =============================================================================
export type {
  CategoryError,
  CategoriesProviderError,
  CategoryNotFoundError,
  ProviderError,
  ListCategoriesError,
  GetCategoryError,
  CreateCategoryError,
  UpdateCategoryError,
  DeleteCategoryError,
} from './core/errors.js';
export {
  createCategoryNotFoundError,
  createProviderError,
  isCategoryNotFoundError,
  getHttpStatusForError,
  CATEGORY_ERROR_HTTP_STATUS,
} from './core/errors.js';
