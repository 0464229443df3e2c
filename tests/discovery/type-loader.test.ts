import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  ModuleTypeLoader,
  TypeLoadError,
  TypeNotFoundError,
  isModel,
} from '../../src/index.js';

const FIXTURES = fileURLToPath(new URL('../fixtures/modules', import.meta.url));

function createLoader(): ModuleTypeLoader {
  return new ModuleTypeLoader({ searchRoots: [join(FIXTURES, 'missing-root'), FIXTURES], extensions: ['.ts'] });
}

describe('ModuleTypeLoader', () => {
  it('loads the export named after the last segment', async () => {
    const value = await createLoader().load('acme.notes.models.Journal');

    expect(isModel(value)).toBe(true);
    expect(value).toHaveProperty('name', 'Journal');
    expect(value).toHaveProperty('table', { name: 'journals' });
  });

  it('falls back to the default export', async () => {
    const value = await createLoader().load('acme.notes.models.Archived');

    expect(isModel(value)).toBe(true);
    expect(value).toHaveProperty('name', 'Archived');
  });

  it('throws TypeNotFoundError when no module matches', async () => {
    await expect(createLoader().load('acme.notes.models.Absent')).rejects.toThrow(TypeNotFoundError);
  });

  it('throws TypeNotFoundError when the module has no matching export', async () => {
    await expect(createLoader().load('acme.notes.models.Unrelated')).rejects.toThrow(
      'Type not found: acme.notes.models.Unrelated'
    );
  });

  it('throws TypeNotFoundError for malformed names', async () => {
    await expect(createLoader().load('acme..Journal')).rejects.toThrow(TypeNotFoundError);
  });

  it('wraps module evaluation errors in TypeLoadError', async () => {
    const error = await createLoader()
      .load('acme.notes.models.Exploding')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TypeLoadError);
    expect(error).toMatchObject({ typeName: 'acme.notes.models.Exploding' });
  });

  it('adds search roots once', () => {
    const loader = new ModuleTypeLoader({ searchRoots: [FIXTURES] });

    loader.addSearchRoot(join(FIXTURES, 'extra'));
    loader.addSearchRoot(join(FIXTURES, 'extra'));

    expect(loader.getSearchRoots()).toEqual([FIXTURES, join(FIXTURES, 'extra')]);
  });
});
