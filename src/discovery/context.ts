import { join } from 'node:path';
import type { DeploymentContext, PreferenceStore, TypeLoader } from './types.js';
import { FilePreferences } from './preferences.js';
import { ModuleTypeLoader } from './type-loader.js';

/** Directory under the data directory holding preference files. */
export const PREFERENCES_FOLDER_NAME = 'shared_prefs';

/**
 * Options for createDeploymentContext.
 */
export interface DeploymentContextOptions {
  readonly packageName: string;
  readonly sourcePath: string;
  readonly dataDir: string;
  /** @default [] */
  readonly resourceRoots?: readonly string[];
  /**
   * Type loader.
   * @default a ModuleTypeLoader searching `resourceRoots`
   */
  readonly typeLoader?: TypeLoader;
}

/**
 * Creates a deployment context whose preferences are JSON files in
 * `<dataDir>/shared_prefs`.
 */
export function createDeploymentContext(options: DeploymentContextOptions): DeploymentContext {
  const resourceRoots = [...(options.resourceRoots ?? [])];
  const preferencesDirectory = join(options.dataDir, PREFERENCES_FOLDER_NAME);

  return {
    packageName: options.packageName,
    sourcePath: options.sourcePath,
    dataDir: options.dataDir,
    resourceRoots,
    typeLoader: options.typeLoader ?? new ModuleTypeLoader({ searchRoots: resourceRoots }),
    getPreferences(name: string): PreferenceStore {
      return new FilePreferences({ directory: preferencesDirectory, name });
    },
  };
}
