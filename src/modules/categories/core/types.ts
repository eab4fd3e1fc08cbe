/**
 * Domain types for the Categories module.
 *
 * A category groups content under a display name, with an optional description
 * and icon. Identifiers are opaque strings assigned by the provider.
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Domain Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Category entity.
 */
export interface Category {
  /** Provider-assigned, immutable after creation */
  id: string;
  name: string;
  description?: string | undefined;
  /** Icon reference (usually a URL) */
  iconUrl?: string | undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Pagination Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One page of a cursor-paginated listing.
 *
 * `cursor` is the id of the last item, to be passed back as `startAfterId`.
 */
export interface PaginatedResponse<T> {
  readonly items: readonly T[];
  readonly cursor: string | null;
  readonly hasMore: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case Input Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Input for list categories use case.
 */
export interface ListCategoriesInput {
  /** Page size. Absent means the caller asked for no explicit page size. */
  limit?: number | undefined;
  /** Cursor from a previous page. Absent means start from the beginning. */
  startAfterId?: string | undefined;
}

/**
 * Input for create category use case.
 */
export interface CreateCategoryInput {
  name: string;
  description?: string | undefined;
  iconUrl?: string | undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Runtime schema for a stored category. Used by providers that validate writes.
 */
export const CategorySchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  name: Type.String({ minLength: 1 }),
  description: Type.Optional(Type.String()),
  iconUrl: Type.Optional(Type.String()),
});

export type CategoryDTO = Static<typeof CategorySchema>;
