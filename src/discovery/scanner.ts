/**
 * Discovery pass.
 *
 * Tries the explicit configuration first. Without a valid configuration
 * the artifacts of the deployment are located, enumerated and
 * classified one location at a time.
 */

import { join } from 'node:path';
import type { RegistryBuilder } from '../registry/registry-builder.js';
import type {
  Candidate,
  Configuration,
  DiscoveryOptions,
  DiscoveryPhase,
  ScanReport,
} from './types.js';
import { DISCOVERY_DEFAULTS, UNPACK_FOLDER_NAME } from './types.js';
import { createConsoleLogger } from './logger.js';
import { ScanRecorder } from './scan-recorder.js';
import { loadFromConfiguration } from './configuration.js';
import { resolveArtifactLocations } from './artifact-locator.js';
import { ArchiveEnumerator, ResourceRootEnumerator, selectEnumerator } from './enumerators.js';
import { reconstructTypeName } from './type-names.js';
import { classifyCandidate } from './classifier.js';
import { toError } from './errors.js';

/**
 * Runs one discovery pass into `builder`.
 *
 * @returns the report of the pass
 * @throws {MissingSecondaryArtifactError} If the deployment is missing a secondary unit
 * @throws {PreferencesError} If the unit counter cannot be read
 * @throws {InvalidModelError} If a declared entity type is not a model
 */
export async function runDiscovery(
  configuration: Configuration,
  builder: RegistryBuilder,
  options: DiscoveryOptions = {}
): Promise<ScanReport> {
  const logger = options.logger ?? createConsoleLogger(DISCOVERY_DEFAULTS.LOG_LEVEL);
  const recorder = new ScanRecorder(logger, options.onError);
  const unitExtensions = options.unitExtensions ?? DISCOVERY_DEFAULTS.UNIT_EXTENSIONS;

  let phase: DiscoveryPhase = 'uninitialized';
  const enter = (next: DiscoveryPhase): void => {
    if (next === phase) {
      return;
    }
    phase = next;
    logger.debug(`Discovery phase: ${next}`);
    options.onPhaseChange?.(next);
  };

  enter('loading-configuration');
  if (loadFromConfiguration(configuration, builder, recorder)) {
    enter('config-populated');
    enter('ready');
    logger.info('Model registry loaded from configuration.');
    return recorder.toReport('configuration', []);
  }

  const { context } = configuration;

  enter('locating-artifacts');
  const locations = await resolveArtifactLocations(context);

  const enumerators = {
    archive: new ArchiveEnumerator({
      unitExtensions,
      typeLoader: context.typeLoader,
      unpackDirectory: join(context.dataDir, UNPACK_FOLDER_NAME),
    }),
    resourceRoots: new ResourceRootEnumerator({
      resourceRoots: context.resourceRoots,
      outputMarkers: options.outputMarkers ?? DISCOVERY_DEFAULTS.OUTPUT_MARKERS,
      onRootError: (error) => recorder.failed(error.location, error),
    }),
  };

  for (const location of locations) {
    enter('enumerating-units');
    let candidates: readonly Candidate[];
    try {
      const enumerator = await selectEnumerator(
        location,
        options.enumeration ?? DISCOVERY_DEFAULTS.ENUMERATION,
        enumerators
      );
      candidates = await enumerator.enumerate(location);
    } catch (error) {
      recorder.failed(location, toError(error));
      continue;
    }

    enter('classifying-candidates');
    for (const candidate of candidates) {
      if (candidate.kind === 'name') {
        await classifyCandidate(candidate.name, context.typeLoader, builder, recorder);
        continue;
      }

      const reconstructed = reconstructTypeName(candidate.path, context.packageName, unitExtensions);
      if (reconstructed.ok) {
        await classifyCandidate(reconstructed.name, context.typeLoader, builder, recorder);
      } else if (reconstructed.reason === 'outside-package') {
        recorder.skipped(
          candidate.path,
          reconstructed.reason,
          `Compiled unit outside package ${context.packageName}`
        );
      }
    }
  }

  enter('ready');
  logger.info('Model registry loaded.', { locations: locations.length });
  return recorder.toReport('scan', locations);
}
