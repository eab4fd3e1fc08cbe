/**
 * Unit tests for categories pure logic.
 */

import { err, ok } from 'neverthrow';
import { describe, expect, it } from 'vitest';

import {
  createCategoryNotFoundError,
  createGetCategoryError,
  createProviderError,
} from '@/modules/categories/core/errors.js';
import {
  callProvider,
  passThroughNotFound,
  toPaginatedResponse,
} from '@/modules/categories/core/logic.js';

import { makeCategories } from '../../fixtures/builders.js';

describe('toPaginatedResponse', () => {
  it.each([
    { length: 3, limit: 3, hasMore: true },
    { length: 2, limit: 3, hasMore: false },
    { length: 3, limit: undefined, hasMore: false },
    { length: 0, limit: 3, hasMore: false },
    { length: 0, limit: undefined, hasMore: false },
  ])('hasMore is $hasMore for $length items and limit $limit', ({ length, limit, hasMore }) => {
    const page = toPaginatedResponse(makeCategories(length), limit);

    expect(page.hasMore).toBe(hasMore);
  });

  it('uses the last item ID as cursor', () => {
    const page = toPaginatedResponse(makeCategories(4), 10);

    expect(page.cursor).toBe('cat-3');
  });

  it('has a null cursor for an empty page', () => {
    const page = toPaginatedResponse([], 10);

    expect(page.cursor).toBeNull();
    expect(page.items).toEqual([]);
  });

  it('keeps the items in provider order', () => {
    const items = makeCategories(3).reverse();

    const page = toPaginatedResponse(items, undefined);

    expect(page.items.map((item) => item.id)).toEqual(['cat-2', 'cat-1', 'cat-0']);
  });
});

describe('passThroughNotFound', () => {
  const translate = passThroughNotFound(createGetCategoryError);

  it('returns CategoryNotFoundError as is', () => {
    const notFound = createCategoryNotFoundError('abc');

    expect(translate(notFound)).toBe(notFound);
  });

  it('wraps ProviderError', () => {
    const cause = createProviderError('boom');

    expect(translate(cause)).toEqual({
      type: 'GetCategoryError',
      message: 'Failed to get category: boom',
      cause,
      stack: undefined,
    });
  });
});

describe('callProvider', () => {
  it('returns the provider result', async () => {
    const result = await callProvider(async () => ok(42));

    expect(result._unsafeUnwrap()).toBe(42);
  });

  it('returns the provider failure', async () => {
    const failure = createProviderError('nope');

    const result = await callProvider(async () => err(failure));

    expect(result._unsafeUnwrapErr()).toBe(failure);
  });

  it('turns a thrown error into a ProviderError', async () => {
    const thrown = new Error('kaput');

    const result = await callProvider(async () => {
      throw thrown;
    });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'ProviderError',
      message: 'Categories provider threw unexpectedly',
      cause: thrown,
    });
  });
});
