/**
 * Loads initial categories from a YAML file.
 *
 * Expected layout:
 *
 * ```yaml
 * categories:
 *   - id: technology
 *     name: Technology
 *     description: Gadgets and software
 *     iconUrl: https://example.com/icons/technology.svg
 * ```
 */

import fs from 'node:fs/promises';

import { Type } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';
import { parse as parseYaml } from 'yaml';

import { formatSchemaErrors } from '@/common/types/errors.js';

import { CategorySchema, type Category } from '../../core/types.js';

export const CategorySeedFileSchema = Type.Object({
  categories: Type.Array(CategorySchema),
});

const validator = TypeCompiler.Compile(CategorySeedFileSchema);

export type CategorySeedError =
  | { type: 'SeedNotFound'; message: string }
  | { type: 'SeedReadError'; message: string }
  | { type: 'SeedParseError'; message: string }
  | { type: 'SeedSchemaError'; message: string; details: string[] }
  | { type: 'SeedDuplicateId'; message: string; id: string };

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const loadCategorySeed = async (
  filePath: string
): Promise<Result<Category[], CategorySeedError>> => {
  let contents: string;

  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT') {
      return err({
        type: 'SeedNotFound',
        message: `Category seed file not found at ${filePath}`,
      });
    }

    return err({
      type: 'SeedReadError',
      message: `Failed to read category seed file at ${filePath}: ${describeError(error)}`,
    });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(contents);
  } catch (error) {
    return err({
      type: 'SeedParseError',
      message: `Failed to parse YAML at ${filePath}: ${describeError(error)}`,
    });
  }

  if (!validator.Check(parsed)) {
    return err({
      type: 'SeedSchemaError',
      message: `Schema validation failed for ${filePath}`,
      details: formatSchemaErrors(validator.Errors(parsed)),
    });
  }

  const seen = new Set<string>();
  for (const category of parsed.categories) {
    if (seen.has(category.id)) {
      return err({
        type: 'SeedDuplicateId',
        message: `Category id '${category.id}' appears more than once in ${filePath}`,
        id: category.id,
      });
    }
    seen.add(category.id);
  }

  return ok(parsed.categories);
};
