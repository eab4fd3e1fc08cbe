/**
 * Pure logic for the Categories module.
 */

import { err, type Result } from 'neverthrow';

import {
  createProviderError,
  type CategoryNotFoundError,
  type CategoriesProviderError,
  type ProviderError,
} from './errors.js';

import type { Category, PaginatedResponse } from './types.js';

/**
 * Builds a page from the items one list call returned.
 *
 * A full page (length equal to the requested limit) is taken to mean more items
 * may follow. A short page, or a listing without a limit, is taken as complete.
 * This cannot tell a full last page apart from a page with more behind it.
 */
export const toPaginatedResponse = (
  items: readonly Category[],
  limit: number | undefined
): PaginatedResponse<Category> => {
  const last = items.at(-1);

  return {
    items,
    cursor: last !== undefined ? last.id : null,
    hasMore: limit !== undefined && items.length === limit,
  };
};

/**
 * Keeps CategoryNotFoundError as is and wraps every other provider failure.
 */
export const passThroughNotFound =
  <E>(wrap: (cause: ProviderError) => E) =>
  (error: CategoriesProviderError): CategoryNotFoundError | E =>
    error.type === 'CategoryNotFoundError' ? error : wrap(error);

/**
 * Awaits a provider call, turning a rejected promise into a ProviderError.
 *
 * Providers are expected to return failures, but a broken one may still throw.
 */
export const callProvider = async <T, E>(
  call: () => Promise<Result<T, E>>
): Promise<Result<T, E | ProviderError>> => {
  try {
    return await call();
  } catch (error) {
    return err(createProviderError('Categories provider threw unexpectedly', error));
  }
};
