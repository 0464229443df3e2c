/**
 * Entity and serializer discovery.
 *
 * @module discovery
 */

// Types
export type {
  LogLevel,
  Logger,
  PreferenceStore,
  TypeLoader,
  DeploymentContext,
  Configuration,
  Candidate,
  EnumerationMode,
  DiscoveryPhase,
  ScanOutcome,
  ScanReport,
  DiscoveryOptions,
} from './types.js';
export {
  DISCOVERY_DEFAULTS,
  SECONDARY_UNIT_COUNTER,
  SECONDARY_FOLDER_NAME,
  UNPACK_FOLDER_NAME,
  EXTRACTED_NAME_EXT,
  EXTRACTED_SUFFIX,
} from './types.js';

// Error classes
export {
  MissingSecondaryArtifactError,
  PreferencesError,
  ArtifactReadError,
  TypeNotFoundError,
  TypeLoadError,
  SerializerInstantiationError,
} from './errors.js';

// Logging
export { createConsoleLogger, noopLogger } from './logger.js';

// Deployment
export { MemoryPreferences, FilePreferences } from './preferences.js';
export type { FilePreferencesOptions } from './preferences.js';
export { ModuleTypeLoader } from './type-loader.js';
export type { ModuleTypeLoaderOptions } from './type-loader.js';
export { createDeploymentContext, PREFERENCES_FOLDER_NAME } from './context.js';
export type { DeploymentContextOptions } from './context.js';

// Pass
export { defineConfiguration, loadFromConfiguration } from './configuration.js';
export type { ConfigurationOptions } from './configuration.js';
export { resolveArtifactLocations, secondaryArtifactPath } from './artifact-locator.js';
export {
  ArchiveEnumerator,
  ResourceRootEnumerator,
  selectEnumerator,
  isDirectory,
} from './enumerators.js';
export type {
  CodeUnitEnumerator,
  ArchiveEnumeratorOptions,
  ResourceRootEnumeratorOptions,
} from './enumerators.js';
export { entryToTypeName, reconstructTypeName } from './type-names.js';
export type { ReconstructedName } from './type-names.js';
export { classifyCandidate } from './classifier.js';
export { instantiateSerializer } from './serializer-factory.js';
export { ScanRecorder } from './scan-recorder.js';
export { runDiscovery } from './scanner.js';
