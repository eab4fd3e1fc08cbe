/**
 * Categories Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 *
 * Providers report two kinds of failure: CategoryNotFoundError and ProviderError.
 * The repository passes CategoryNotFoundError through untouched and wraps every
 * ProviderError exactly once in the error kind of the operation that failed.
 */

import { findErrorStack, type AppError } from '@/common/types/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Provider Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * No category exists for the given ID.
 */
export interface CategoryNotFoundError extends AppError {
  readonly type: 'CategoryNotFoundError';
  readonly message: string;
  readonly id: string;
}

/**
 * Any provider failure other than not-found (I/O, validation, bad cursor...).
 */
export interface ProviderError extends AppError {
  readonly type: 'ProviderError';
  readonly message: string;
  readonly details?: readonly string[] | undefined;
  readonly cause?: unknown;
}

/**
 * Failures a provider may report from lookups and writes on a single ID.
 */
export type CategoriesProviderError = CategoryNotFoundError | ProviderError;

// ─────────────────────────────────────────────────────────────────────────────
// Repository Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Shape shared by the wrapped operation errors.
 */
export interface CategoryOperationError {
  readonly message: string;
  /** The provider error that triggered this one */
  readonly cause: ProviderError;
  /** Stack of the Error at the bottom of the cause chain, when there is one */
  readonly stack?: string | undefined;
}

export interface ListCategoriesError extends CategoryOperationError {
  readonly type: 'ListCategoriesError';
}

export interface GetCategoryError extends CategoryOperationError {
  readonly type: 'GetCategoryError';
}

export interface CreateCategoryError extends CategoryOperationError {
  readonly type: 'CreateCategoryError';
}

export interface UpdateCategoryError extends CategoryOperationError {
  readonly type: 'UpdateCategoryError';
}

export interface DeleteCategoryError extends CategoryOperationError {
  readonly type: 'DeleteCategoryError';
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

/**
 * All possible categories module errors.
 */
export type CategoryError =
  | CategoryNotFoundError
  | ListCategoriesError
  | GetCategoryError
  | CreateCategoryError
  | UpdateCategoryError
  | DeleteCategoryError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a CategoryNotFoundError.
 */
export const createCategoryNotFoundError = (id: string): CategoryNotFoundError => ({
  type: 'CategoryNotFoundError',
  message: `Category with ID '${id}' not found`,
  id,
});

/**
 * Creates a ProviderError.
 */
export const createProviderError = (
  message: string,
  cause?: unknown,
  details?: readonly string[]
): ProviderError => ({
  type: 'ProviderError',
  message,
  ...(details !== undefined && { details }),
  ...(cause !== undefined && { cause }),
});

const operationErrorFields = (action: string, cause: ProviderError): CategoryOperationError => ({
  message: `Failed to ${action}: ${cause.message}`,
  cause,
  stack: findErrorStack(cause),
});

/**
 * Creates a ListCategoriesError wrapping the provider failure.
 */
export const createListCategoriesError = (cause: ProviderError): ListCategoriesError => ({
  type: 'ListCategoriesError',
  ...operationErrorFields('list categories', cause),
});

/**
 * Creates a GetCategoryError wrapping the provider failure.
 */
export const createGetCategoryError = (cause: ProviderError): GetCategoryError => ({
  type: 'GetCategoryError',
  ...operationErrorFields('get category', cause),
});

/**
 * Creates a CreateCategoryError wrapping the provider failure.
 */
export const createCreateCategoryError = (cause: ProviderError): CreateCategoryError => ({
  type: 'CreateCategoryError',
  ...operationErrorFields('create category', cause),
});

/**
 * Creates an UpdateCategoryError wrapping the provider failure.
 */
export const createUpdateCategoryError = (cause: ProviderError): UpdateCategoryError => ({
  type: 'UpdateCategoryError',
  ...operationErrorFields('update category', cause),
});

/**
 * Creates a DeleteCategoryError wrapping the provider failure.
 */
export const createDeleteCategoryError = (cause: ProviderError): DeleteCategoryError => ({
  type: 'DeleteCategoryError',
  ...operationErrorFields('delete category', cause),
});

// ─────────────────────────────────────────────────────────────────────────────
// Guards
// ─────────────────────────────────────────────────────────────────────────────

export const isCategoryNotFoundError = (error: {
  readonly type: string;
}): error is CategoryNotFoundError => error.type === 'CategoryNotFoundError';

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Maps error types to HTTP status codes.
 */
export const CATEGORY_ERROR_HTTP_STATUS: Record<CategoryError['type'], number> = {
  CategoryNotFoundError: 404,
  ListCategoriesError: 500,
  GetCategoryError: 500,
  CreateCategoryError: 500,
  UpdateCategoryError: 500,
  DeleteCategoryError: 500,
};

/**
 * Gets HTTP status code for an error.
 */
export const getHttpStatusForError = (error: CategoryError): number => {
  return CATEGORY_ERROR_HTTP_STATUS[error.type];
};
