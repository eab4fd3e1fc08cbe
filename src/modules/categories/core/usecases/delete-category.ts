/**
 * Use case: Delete a category.
 */

import {
  createDeleteCategoryError,
  type CategoryNotFoundError,
  type DeleteCategoryError,
} from '../errors.js';
import { callProvider, passThroughNotFound } from '../logic.js';

import type { CategoriesProvider } from '../ports.js';
import type { Result } from 'neverthrow';

export interface DeleteCategoryDeps {
  categoriesProvider: CategoriesProvider;
}

export const deleteCategory = async (
  deps: DeleteCategoryDeps,
  id: string
): Promise<Result<void, CategoryNotFoundError | DeleteCategoryError>> => {
  const result = await callProvider(() => deps.categoriesProvider.delete(id));

  return result.mapErr(passThroughNotFound(createDeleteCategoryError));
};
