/**
 * Preference stores holding deployment counters.
 *
 * Discovery only reads preferences; the stores are written by whatever
 * installs secondary code units.
 */

import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { PreferenceStore } from './types.js';
import { PreferencesError } from './errors.js';

type PreferenceValues = Readonly<Record<string, unknown>>;

function readInt(values: PreferenceValues, key: string, defaultValue: number): number {
  const value = values[key];
  return typeof value === 'number' && Number.isInteger(value) ? value : defaultValue;
}

/**
 * In-memory preference store.
 *
 * @example
 * ```typescript
 * const prefs = new MemoryPreferences({ 'dex.number': 3 });
 * await prefs.getInt('dex.number', 1); // 3
 * ```
 */
export class MemoryPreferences implements PreferenceStore {
  private readonly values: PreferenceValues;

  constructor(initialValues: PreferenceValues = {}) {
    this.values = { ...initialValues };
  }

  async getInt(key: string, defaultValue: number): Promise<number> {
    return readInt(this.values, key, defaultValue);
  }
}

/**
 * Configuration options for FilePreferences.
 */
export interface FilePreferencesOptions {
  /** Directory holding preference files, one JSON object per store. */
  readonly directory: string;
  /** Store name; the file read is `<directory>/<name>.json`. */
  readonly name: string;
}

/**
 * Preference store backed by a JSON file.
 *
 * A missing file reads as an empty store. The file is read on every
 * lookup.
 */
export class FilePreferences implements PreferenceStore {
  private readonly filePath: string;
  private readonly name: string;

  constructor(options: FilePreferencesOptions) {
    this.name = options.name;
    this.filePath = join(resolve(options.directory), `${options.name}.json`);
  }

  async getInt(key: string, defaultValue: number): Promise<number> {
    const values = await this.readValues();
    return readInt(values, key, defaultValue);
  }

  /**
   * Returns the path of the backing file.
   */
  getFilePath(): string {
    return this.filePath;
  }

  private async readValues(): Promise<PreferenceValues> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return {};
      }
      throw new PreferencesError(
        this.name,
        `Failed to read ${this.filePath}`,
        error instanceof Error ? error : undefined
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new PreferencesError(
        this.name,
        'Invalid JSON',
        error instanceof Error ? error : undefined
      );
    }

    if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new PreferencesError(this.name, 'Expected a JSON object');
    }
    return { ...parsed };
  }
}
