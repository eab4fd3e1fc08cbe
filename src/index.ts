/**
 * Package entry point
 */

export * from './modules/categories/index.js';
export {
  buildCategories,
  type BuildCategoriesDeps,
  type BuildCategoriesError,
  type CategoriesBundle,
} from './app/build-categories.js';
export { parseEnv, createConfig, type AppConfig, type Env } from './infra/config/index.js';
export { createChildLogger, createLogger, type Logger, type LogLevel } from './infra/logger/index.js';
