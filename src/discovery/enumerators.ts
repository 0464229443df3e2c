/**
 * Code unit enumeration.
 *
 * Two strategies behind one interface: packed artifacts are read as
 * zip archives, unpacked deployments are walked from the resource roots.
 */

import { readdir, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import AdmZip from 'adm-zip';
import type { Candidate, EnumerationMode, TypeLoader } from './types.js';
import { EXTRACTED_SUFFIX } from './types.js';
import { ArtifactReadError, toError } from './errors.js';
import { entryToTypeName } from './type-names.js';

/**
 * Lists the candidate types of one artifact location.
 */
export interface CodeUnitEnumerator {
  readonly kind: 'archive' | 'resource-roots';

  /**
   * @throws {ArtifactReadError} If the location cannot be opened or listed
   */
  enumerate(location: string): Promise<readonly Candidate[]>;
}

/**
 * Configuration options for ArchiveEnumerator.
 */
export interface ArchiveEnumeratorOptions {
  /** Entry suffixes treated as compiled units. */
  readonly unitExtensions: readonly string[];
  /** Receives the companion directory of every unpacked archive. */
  readonly typeLoader?: TypeLoader;
  /**
   * Directory primary artifacts are unpacked into.
   * @default the directory holding the artifact
   */
  readonly unpackDirectory?: string;
}

/**
 * Reads a packed artifact as a zip archive.
 *
 * Every archive is unpacked into a companion directory, which is added to
 * the type loader's search roots. Extracted secondary units (`.zip`) use
 * `<location>.tmp`; primary artifacts use `<unpackDirectory>/<name>.tmp`.
 */
export class ArchiveEnumerator implements CodeUnitEnumerator {
  readonly kind = 'archive' as const;

  constructor(private readonly options: ArchiveEnumeratorOptions) {}

  async enumerate(location: string): Promise<readonly Candidate[]> {
    try {
      const archive = new AdmZip(location);

      const companion = this.companionDirectory(location);
      archive.extractAllTo(companion, true);
      this.options.typeLoader?.addSearchRoot?.(companion);

      const candidates: Candidate[] = [];
      for (const entry of archive.getEntries()) {
        if (entry.isDirectory) {
          continue;
        }
        const name = entryToTypeName(entry.entryName, this.options.unitExtensions);
        if (name !== undefined) {
          candidates.push({ kind: 'name', name });
        }
      }
      return candidates;
    } catch (error) {
      throw new ArtifactReadError(location, toError(error));
    }
  }

  /**
   * Returns the directory an archive is unpacked into.
   */
  companionDirectory(location: string): string {
    const { unpackDirectory } = this.options;
    if (location.endsWith(EXTRACTED_SUFFIX) || unpackDirectory === undefined) {
      return `${location}.tmp`;
    }
    return join(unpackDirectory, `${basename(location)}.tmp`);
  }
}

/**
 * Configuration options for ResourceRootEnumerator.
 */
export interface ResourceRootEnumeratorOptions {
  readonly resourceRoots: readonly string[];
  /** A root is walked only if its path contains one of these markers. */
  readonly outputMarkers: readonly string[];
  /** Called for every marked root that cannot be listed. */
  readonly onRootError?: (error: ArtifactReadError) => void;
}

/**
 * Walks the resource roots of an unpacked deployment.
 *
 * Produces a `path` candidate for every file under a marked root; the
 * location itself is not read. A root that cannot be listed contributes
 * no candidates and is reported through `onRootError`.
 */
export class ResourceRootEnumerator implements CodeUnitEnumerator {
  readonly kind = 'resource-roots' as const;

  constructor(private readonly options: ResourceRootEnumeratorOptions) {}

  async enumerate(_location: string): Promise<readonly Candidate[]> {
    const candidates: Candidate[] = [];
    for (const root of this.options.resourceRoots) {
      if (!this.options.outputMarkers.some((marker) => root.includes(marker))) {
        continue;
      }
      const found: Candidate[] = [];
      try {
        await walk(root, found);
      } catch (error) {
        this.options.onRootError?.(new ArtifactReadError(root, toError(error)));
        continue;
      }
      candidates.push(...found);
    }
    return candidates;
  }
}

async function walk(directory: string, candidates: Candidate[]): Promise<void> {
  const entries = await readdir(directory, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const path = join(directory, entry.name);
    if (entry.isDirectory()) {
      await walk(path, candidates);
    } else if (entry.isFile()) {
      candidates.push({ kind: 'path', path });
    }
  }
}

/**
 * Checks whether a location is a directory. Missing locations are not.
 */
export async function isDirectory(location: string): Promise<boolean> {
  try {
    return (await stat(location)).isDirectory();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Picks the enumerator for a location.
 *
 * In `auto` mode directories use the resource root walk and anything
 * else is read as an archive.
 */
export async function selectEnumerator(
  location: string,
  mode: EnumerationMode,
  enumerators: { readonly archive: CodeUnitEnumerator; readonly resourceRoots: CodeUnitEnumerator }
): Promise<CodeUnitEnumerator> {
  switch (mode) {
    case 'archive':
      return enumerators.archive;
    case 'resource-roots':
      return enumerators.resourceRoots;
    case 'auto':
      return (await isDirectory(location)) ? enumerators.resourceRoots : enumerators.archive;
  }
}
