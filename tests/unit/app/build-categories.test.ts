import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { buildCategories } from '@/app/build-categories.js';
import { createSilentLogger } from '@/infra/logger/index.js';

import { makeTestConfig } from '../../fixtures/builders.js';
import { makeRecordingDb } from '../../fixtures/recording-db.js';

import type { CategoriesDatabase } from '@/infra/database/client.js';

const logger = createSilentLogger();

describe('buildCategories', () => {
  it('builds an empty in-memory repository by default', async () => {
    const result = await buildCategories({ config: makeTestConfig(), logger });

    const { repository } = result._unsafeUnwrap();
    const created = await repository.createCategory({ name: 'Science' });
    const page = await repository.listCategories({ limit: 5 });

    expect(page._unsafeUnwrap().items).toEqual([created._unsafeUnwrap()]);
    expect(page._unsafeUnwrap().hasMore).toBe(false);
  });

  it('seeds the in-memory provider from the configured file', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'build-categories-'));
    const seedFile = path.join(dir, 'seed.yaml');
    await writeFile(
      seedFile,
      'categories:\n  - id: technology\n    name: Technology\n  - id: sports\n    name: Sports\n',
      'utf8'
    );

    const result = await buildCategories({
      config: makeTestConfig({ categories: { seedFile } }),
      logger,
    });

    const page = await result._unsafeUnwrap().repository.listCategories({ limit: 1 });
    expect(page._unsafeUnwrap()).toEqual({
      items: [{ id: 'technology', name: 'Technology' }],
      cursor: 'technology',
      hasMore: true,
    });
  });

  it('returns the seed error when the seed file is missing', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'build-categories-'));

    const result = await buildCategories({
      config: makeTestConfig({ categories: { seedFile: path.join(dir, 'absent.yaml') } }),
      logger,
    });

    expect(result._unsafeUnwrapErr().type).toBe('SeedNotFound');
  });

  it('requires DATABASE_URL for the postgres provider', async () => {
    const result = await buildCategories({
      config: makeTestConfig({ categories: { provider: 'postgres' } }),
      logger,
    });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'ConfigError',
      message: 'DATABASE_URL is required when CATEGORIES_PROVIDER is postgres',
    });
  });

  it('wires the postgres provider to the given database client', async () => {
    const { db, queries, respond } = makeRecordingDb<CategoriesDatabase>();
    respond({ rows: [] });

    const result = await buildCategories({
      config: makeTestConfig({ categories: { provider: 'postgres' } }),
      logger,
      db,
    });

    const bundle = result._unsafeUnwrap();
    const page = await bundle.repository.listCategories();

    expect(page._unsafeUnwrap()).toEqual({ items: [], cursor: null, hasMore: false });
    expect(queries).toHaveLength(1);
    await bundle.close();
  });
});
