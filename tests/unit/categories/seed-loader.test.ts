import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { loadCategorySeed } from '@/modules/categories/shell/providers/seed-loader.js';

const writeSeed = async (contents: string): Promise<string> => {
  const dir = await mkdtemp(path.join(tmpdir(), 'category-seed-'));
  const filePath = path.join(dir, 'categories.yaml');
  await writeFile(filePath, contents, 'utf8');
  return filePath;
};

const validYaml = `categories:
  - id: technology
    name: Technology
    description: Gadgets and software
    iconUrl: https://example.com/icons/technology.svg
  - id: sports
    name: Sports
`;

describe('category seed loader', () => {
  it('loads categories from YAML', async () => {
    const filePath = await writeSeed(validYaml);

    const result = await loadCategorySeed(filePath);

    expect(result._unsafeUnwrap()).toEqual([
      {
        id: 'technology',
        name: 'Technology',
        description: 'Gadgets and software',
        iconUrl: 'https://example.com/icons/technology.svg',
      },
      { id: 'sports', name: 'Sports' },
    ]);
  });

  it('reports a missing file', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'category-seed-'));
    const filePath = path.join(dir, 'missing.yaml');

    const result = await loadCategorySeed(filePath);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'SeedNotFound',
      message: `Category seed file not found at ${filePath}`,
    });
  });

  it('reports invalid YAML', async () => {
    const filePath = await writeSeed('categories: [unclosed');

    const result = await loadCategorySeed(filePath);

    expect(result._unsafeUnwrapErr().type).toBe('SeedParseError');
  });

  it('reports schema violations with paths', async () => {
    const filePath = await writeSeed(`categories:
  - id: technology
    name: ""
`);

    const result = await loadCategorySeed(filePath);

    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe('SeedSchemaError');
    if (error.type === 'SeedSchemaError') {
      expect(error.details.some((line) => line.startsWith('/categories/0/name:'))).toBe(true);
    }
  });

  it('reports duplicate IDs', async () => {
    const filePath = await writeSeed(`categories:
  - id: technology
    name: Technology
  - id: technology
    name: Tech again
`);

    const result = await loadCategorySeed(filePath);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'SeedDuplicateId',
      message: `Category id 'technology' appears more than once in ${filePath}`,
      id: 'technology',
    });
  });
});
