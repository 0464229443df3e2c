/**
 * Module-backed type loader.
 */

import { stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { TypeLoader } from './types.js';
import { DISCOVERY_DEFAULTS } from './types.js';
import { TypeLoadError, TypeNotFoundError, toError } from './errors.js';

/**
 * Configuration options for ModuleTypeLoader.
 */
export interface ModuleTypeLoaderOptions {
  /** Directories searched in order. */
  readonly searchRoots: readonly string[];
  /**
   * Module file extensions tried in order.
   * @default ['.js', '.mjs', '.cjs']
   */
  readonly extensions?: readonly string[];
}

/**
 * Loads types by importing ES modules from a set of search roots.
 *
 * The name `acme.notes.Note` resolves to `<root>/acme/notes/Note<ext>`
 * for the first root and extension that exist. The loaded value is the
 * module's `Note` export, or its default export.
 *
 * @example
 * ```typescript
 * const loader = new ModuleTypeLoader({ searchRoots: ['./dist'] });
 * const Note = await loader.load('acme.notes.models.Note');
 * ```
 */
export class ModuleTypeLoader implements TypeLoader {
  private readonly searchRoots: string[];
  private readonly extensions: readonly string[];

  constructor(options: ModuleTypeLoaderOptions) {
    this.searchRoots = options.searchRoots.map((root) => resolve(root));
    this.extensions = options.extensions ?? DISCOVERY_DEFAULTS.UNIT_EXTENSIONS;
  }

  addSearchRoot(directory: string): void {
    const root = resolve(directory);
    if (!this.searchRoots.includes(root)) {
      this.searchRoots.push(root);
    }
  }

  getSearchRoots(): readonly string[] {
    return [...this.searchRoots];
  }

  async load(typeName: string): Promise<unknown> {
    const segments = typeName.split('.');
    const exportName = segments[segments.length - 1];
    if (exportName === undefined || segments.some((segment) => segment === '')) {
      throw new TypeNotFoundError(typeName);
    }

    const file = await this.resolveFile(segments);
    if (file === undefined) {
      throw new TypeNotFoundError(typeName);
    }

    let namespace: unknown;
    try {
      namespace = await import(pathToFileURL(file).href);
    } catch (error) {
      throw new TypeLoadError(typeName, toError(error));
    }

    if (namespace === null || typeof namespace !== 'object') {
      throw new TypeNotFoundError(typeName);
    }
    const exported = new Map<string, unknown>(Object.entries(namespace));
    if (exported.has(exportName)) {
      return exported.get(exportName);
    }
    if (exported.has('default')) {
      return exported.get('default');
    }
    throw new TypeNotFoundError(typeName);
  }

  private async resolveFile(segments: readonly string[]): Promise<string | undefined> {
    for (const root of this.searchRoots) {
      for (const extension of this.extensions) {
        const candidate = `${join(root, ...segments)}${extension}`;
        if (await exists(candidate)) {
          return candidate;
        }
      }
    }
    return undefined;
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}
