/**
 * Use case: Create a category.
 */

import { createCreateCategoryError, type CreateCategoryError } from '../errors.js';
import { callProvider } from '../logic.js';

import type { CategoriesProvider } from '../ports.js';
import type { Category, CreateCategoryInput } from '../types.js';
import type { Result } from 'neverthrow';

export interface CreateCategoryDeps {
  categoriesProvider: CategoriesProvider;
}

/**
 * Creates a category and returns it with its provider-assigned ID.
 *
 * Field validation is left to the provider.
 */
export const createCategory = async (
  deps: CreateCategoryDeps,
  input: CreateCategoryInput
): Promise<Result<Category, CreateCategoryError>> => {
  const result = await callProvider(() => deps.categoriesProvider.create(input));

  return result.mapErr(createCreateCategoryError);
};
