/**
 * Use case: Update a category.
 */

import {
  createUpdateCategoryError,
  type CategoryNotFoundError,
  type UpdateCategoryError,
} from '../errors.js';
import { callProvider, passThroughNotFound } from '../logic.js';

import type { CategoriesProvider } from '../ports.js';
import type { Category } from '../types.js';
import type { Result } from 'neverthrow';

export interface UpdateCategoryDeps {
  categoriesProvider: CategoriesProvider;
}

/**
 * Updates the category identified by `category.id` with the other fields.
 */
export const updateCategory = async (
  deps: UpdateCategoryDeps,
  category: Category
): Promise<Result<Category, CategoryNotFoundError | UpdateCategoryError>> => {
  const result = await callProvider(() => deps.categoriesProvider.update(category));

  return result.mapErr(passThroughNotFound(createUpdateCategoryError));
};
