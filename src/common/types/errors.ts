/**
 * Base error types for the application
 * All domain errors should extend these base types
 */

import type { ValueError } from '@sinclair/typebox/errors';

/**
 * Base interface for all application errors
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Flattens TypeBox validation errors into `path: message` lines.
 */
export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);

/**
 * Walks a chain of `cause` links and returns the stack of the first thrown Error.
 *
 * Error values in this codebase are plain objects, so the trace of the original
 * failure lives on whatever Error sits at the bottom of the chain.
 */
export const findErrorStack = (value: unknown, maxDepth = 8): string | undefined => {
  let current = value;

  for (let depth = 0; depth < maxDepth; depth++) {
    if (current instanceof Error) {
      return current.stack;
    }
    if (typeof current !== 'object' || current === null || !('cause' in current)) {
      return undefined;
    }
    current = current.cause;
  }

  return undefined;
};
