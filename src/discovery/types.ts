/**
 * Discovery types.
 *
 * Type definitions for the deployment context, explicit configuration,
 * scan candidates and the report a discovery pass produces.
 */

import type { ModelType } from '../model/index.js';
import type { TypeSerializerClass } from '../serializers/index.js';

// --- Logging ---

/**
 * Severity of a log record.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Sink for discovery log records.
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

// --- Deployment ---

/**
 * Read access to a named preference store.
 */
export interface PreferenceStore {
  /**
   * Reads an integer value.
   * @param key - Preference key
   * @param defaultValue - Returned when the key is absent or not an integer
   */
  getInt(key: string, defaultValue: number): Promise<number>;
}

/**
 * Resolves fully-qualified type names to loaded values.
 */
export interface TypeLoader {
  /**
   * Loads the value exported for a dotted type name.
   * @throws {TypeNotFoundError} If no module matches the name
   * @throws {TypeLoadError} If the module fails to evaluate
   */
  load(typeName: string): Promise<unknown>;

  /**
   * Adds a directory modules may be loaded from.
   * Called for archives unpacked during enumeration.
   */
  addSearchRoot?(directory: string): void;
}

/**
 * The deployed application discovery runs for.
 */
export interface DeploymentContext {
  /** Dotted package namespace of the application, e.g. `acme.notes` */
  readonly packageName: string;
  /** Path of the primary artifact */
  readonly sourcePath: string;
  /** Private data directory of the application */
  readonly dataDir: string;
  /** Roots walked when the primary artifact is an unpacked directory */
  readonly resourceRoots: readonly string[];
  /** Loader used to resolve candidate type names */
  readonly typeLoader: TypeLoader;
  /** Opens a named preference store */
  getPreferences(name: string): PreferenceStore;
}

// --- Configuration ---

/**
 * Explicit registry configuration.
 *
 * When `valid` is true the declared lists populate the registry and no
 * discovery runs.
 */
export interface Configuration {
  readonly context: DeploymentContext;
  readonly valid: boolean;
  readonly declaredEntityTypes?: readonly ModelType[];
  readonly declaredSerializerTypes?: readonly TypeSerializerClass[];
}

// --- Scanning ---

/**
 * A type found in an artifact location.
 *
 * `name` candidates come from archive listings; `path` candidates come
 * from the directory fallback and need their name reconstructed.
 */
export type Candidate =
  | { readonly kind: 'name'; readonly name: string }
  | { readonly kind: 'path'; readonly path: string };

/**
 * How artifact locations are enumerated.
 *
 * `auto` probes each location: directories use the resource root walk,
 * everything else is read as an archive.
 */
export type EnumerationMode = 'auto' | 'archive' | 'resource-roots';

/**
 * Phases of a discovery pass.
 */
export type DiscoveryPhase =
  | 'uninitialized'
  | 'loading-configuration'
  | 'config-populated'
  | 'locating-artifacts'
  | 'enumerating-units'
  | 'classifying-candidates'
  | 'ready';

/**
 * Outcome recorded for one candidate or location.
 */
export type ScanOutcome =
  | { readonly status: 'registered-model'; readonly name: string }
  | { readonly status: 'registered-serializer'; readonly name: string }
  | { readonly status: 'skipped'; readonly name: string; readonly reason: string }
  | { readonly status: 'failed'; readonly name: string; readonly error: Error };

/**
 * Record of one completed discovery pass.
 */
export interface ScanReport {
  readonly mode: 'configuration' | 'scan';
  /** Resolved artifact locations, empty when configuration was used */
  readonly locations: readonly string[];
  readonly outcomes: readonly ScanOutcome[];
}

/**
 * Options for a discovery pass.
 */
export interface DiscoveryOptions {
  /**
   * Log sink.
   * @default createConsoleLogger(DISCOVERY_DEFAULTS.LOG_LEVEL)
   */
  readonly logger?: Logger;

  /**
   * Enumeration strategy.
   * @default 'auto'
   */
  readonly enumeration?: EnumerationMode;

  /**
   * Substrings that mark compiled-output paths in the directory fallback.
   * @default ['bin', 'classes', 'dist']
   */
  readonly outputMarkers?: readonly string[];

  /**
   * File suffixes of compiled units.
   * @default ['.js', '.mjs', '.cjs']
   */
  readonly unitExtensions?: readonly string[];

  /**
   * Called with every error absorbed during the pass.
   */
  readonly onError?: (error: Error) => void;

  /**
   * Called on every phase transition.
   */
  readonly onPhaseChange?: (phase: DiscoveryPhase) => void;
}

/**
 * Default values for discovery options.
 */
export const DISCOVERY_DEFAULTS = {
  ENUMERATION: 'auto',
  OUTPUT_MARKERS: ['bin', 'classes', 'dist'],
  UNIT_EXTENSIONS: ['.js', '.mjs', '.cjs'],
  LOG_LEVEL: 'info',
} as const;

/**
 * Preference store and key holding the number of code units.
 */
export const SECONDARY_UNIT_COUNTER = {
  STORE: 'multidex.version',
  KEY: 'dex.number',
} as const;

/** Directory under the data directory holding secondary units. */
export const SECONDARY_FOLDER_NAME = 'code_cache/secondary-dexes';

/** Directory under the data directory holding the unpacked primary artifact. */
export const UNPACK_FOLDER_NAME = 'code_cache';

/** Infix between the primary artifact name and the unit number. */
export const EXTRACTED_NAME_EXT = '.classes';

/** Suffix of extracted secondary units. */
export const EXTRACTED_SUFFIX = '.zip';
