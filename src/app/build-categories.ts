/**
 * Categories repository factory
 * Picks and configures the provider named in the application config
 */

import { err, ok, type Result } from 'neverthrow';

import { initDatabase, type CategoriesDbClient } from '../infra/database/client.js';
import {
  loadCategorySeed,
  makeCategoriesRepository,
  makeInMemoryCategoriesProvider,
  makeKyselyCategoriesProvider,
  type CategoriesProvider,
  type CategoriesRepository,
  type CategorySeedError,
} from '../modules/categories/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { Logger } from 'pino';

export interface BuildCategoriesDeps {
  config: AppConfig;
  logger: Logger;
  /** Overrides the database client created from DATABASE_URL */
  db?: CategoriesDbClient;
}

export type BuildCategoriesError =
  | { type: 'ConfigError'; message: string }
  | CategorySeedError;

export interface CategoriesBundle {
  repository: CategoriesRepository;
  /** Releases provider resources (the database pool, when there is one) */
  close: () => Promise<void>;
}

const buildMemoryProvider = async (
  config: AppConfig,
  logger: Logger
): Promise<Result<CategoriesProvider, BuildCategoriesError>> => {
  const { seedFile } = config.categories;
  if (seedFile === undefined) {
    return ok(makeInMemoryCategoriesProvider());
  }

  const seedResult = await loadCategorySeed(seedFile);
  if (seedResult.isErr()) {
    return err(seedResult.error);
  }

  logger.info({ seedFile, count: seedResult.value.length }, 'Loaded category seed');
  return ok(makeInMemoryCategoriesProvider({ categories: seedResult.value }));
};

/**
 * Builds the categories repository and its provider.
 */
export const buildCategories = async (
  deps: BuildCategoriesDeps
): Promise<Result<CategoriesBundle, BuildCategoriesError>> => {
  const { config, logger } = deps;
  const providerName = config.categories.provider;

  logger.info({ provider: providerName }, 'Building categories repository');

  if (providerName === 'postgres') {
    if (deps.db === undefined && (config.database.url === undefined || config.database.url === '')) {
      return err({
        type: 'ConfigError',
        message: 'DATABASE_URL is required when CATEGORIES_PROVIDER is postgres',
      });
    }

    const db = deps.db ?? initDatabase(config);
    const provider = makeKyselyCategoriesProvider({ db, logger });

    return ok({
      repository: makeCategoriesRepository({ provider, logger }),
      close: async () => {
        await db.destroy();
      },
    });
  }

  const providerResult = await buildMemoryProvider(config, logger);
  if (providerResult.isErr()) {
    return err(providerResult.error);
  }

  return ok({
    repository: makeCategoriesRepository({ provider: providerResult.value, logger }),
    close: () => Promise.resolve(),
  });
};
