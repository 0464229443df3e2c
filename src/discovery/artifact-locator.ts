/**
 * Resolves the artifact locations of a deployment.
 *
 * The primary artifact always comes first. Secondary units follow in
 * ascending sequence number, named
 * `<primary file name>.classes<N>.zip` and stored in
 * `<dataDir>/code_cache/secondary-dexes`.
 */

import { stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { DeploymentContext } from './types.js';
import {
  EXTRACTED_NAME_EXT,
  EXTRACTED_SUFFIX,
  SECONDARY_FOLDER_NAME,
  SECONDARY_UNIT_COUNTER,
} from './types.js';
import { MissingSecondaryArtifactError } from './errors.js';

/**
 * Returns the expected path of secondary unit `sequenceNumber`.
 */
export function secondaryArtifactPath(context: DeploymentContext, sequenceNumber: number): string {
  const fileName = `${basename(context.sourcePath)}${EXTRACTED_NAME_EXT}${sequenceNumber}${EXTRACTED_SUFFIX}`;
  return join(context.dataDir, SECONDARY_FOLDER_NAME, fileName);
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return false;
    }
    throw error;
  }
}

/**
 * Resolves the ordered artifact location set.
 *
 * @throws {MissingSecondaryArtifactError} If a unit below the persisted
 *   counter is not present
 * @throws {PreferencesError} If the counter store cannot be read
 */
export async function resolveArtifactLocations(context: DeploymentContext): Promise<readonly string[]> {
  const locations: string[] = [context.sourcePath];

  const preferences = context.getPreferences(SECONDARY_UNIT_COUNTER.STORE);
  const totalUnits = await preferences.getInt(SECONDARY_UNIT_COUNTER.KEY, 1);

  for (let sequenceNumber = 2; sequenceNumber <= totalUnits; sequenceNumber++) {
    const path = secondaryArtifactPath(context, sequenceNumber);
    if (!(await isFile(path))) {
      throw new MissingSecondaryArtifactError(path, sequenceNumber);
    }
    locations.push(path);
  }

  return locations;
}
