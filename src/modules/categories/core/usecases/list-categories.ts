/**
 * Use case: List categories one page at a time.
 */

import { createListCategoriesError, type ListCategoriesError } from '../errors.js';
import { callProvider, toPaginatedResponse } from '../logic.js';

import type { CategoriesProvider } from '../ports.js';
import type { Category, ListCategoriesInput, PaginatedResponse } from '../types.js';
import type { Result } from 'neverthrow';

/**
 * Dependencies for the list categories use case.
 */
export interface ListCategoriesDeps {
  categoriesProvider: CategoriesProvider;
}

/**
 * List categories with cursor pagination.
 *
 * `limit` and `startAfterId` are forwarded to the provider as given; no default
 * page size is applied. The returned cursor is the ID of the last item.
 *
 * @param deps - Provider dependency
 * @param input - Page size and cursor
 * @returns One page of categories, or a ListCategoriesError wrapping the provider failure
 */
export const listCategories = async (
  deps: ListCategoriesDeps,
  input: ListCategoriesInput = {}
): Promise<Result<PaginatedResponse<Category>, ListCategoriesError>> => {
  const result = await callProvider(() =>
    deps.categoriesProvider.list(input.limit, input.startAfterId)
  );

  return result
    .map((items) => toPaginatedResponse(items, input.limit))
    .mapErr(createListCategoriesError);
};
