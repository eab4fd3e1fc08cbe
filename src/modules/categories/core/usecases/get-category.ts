/**
 * Use case: Get a single category by ID.
 */

import {
  createGetCategoryError,
  type CategoryNotFoundError,
  type GetCategoryError,
} from '../errors.js';
import { callProvider, passThroughNotFound } from '../logic.js';

import type { CategoriesProvider } from '../ports.js';
import type { Category } from '../types.js';
import type { Result } from 'neverthrow';

/**
 * Dependencies for the get category use case.
 */
export interface GetCategoryDeps {
  categoriesProvider: CategoriesProvider;
}

/**
 * Get a single category by ID.
 *
 * A missing category is an error, not null: the provider's CategoryNotFoundError
 * is returned unchanged so callers can match on it.
 */
export const getCategory = async (
  deps: GetCategoryDeps,
  id: string
): Promise<Result<Category, CategoryNotFoundError | GetCategoryError>> => {
  const result = await callProvider(() => deps.categoriesProvider.findById(id));

  return result.mapErr(passThroughNotFound(createGetCategoryError));
};
