/**
 * Explicit configuration path.
 */

import type { ModelType } from '../model/index.js';
import type { TypeSerializerClass } from '../serializers/index.js';
import type { RegistryBuilder } from '../registry/registry-builder.js';
import type { Configuration, DeploymentContext } from './types.js';
import type { ScanRecorder } from './scan-recorder.js';
import { instantiateSerializer } from './serializer-factory.js';
import { toError } from './errors.js';

/**
 * Options for defineConfiguration.
 */
export interface ConfigurationOptions {
  readonly context: DeploymentContext;
  readonly modelTypes?: readonly ModelType[];
  readonly serializerTypes?: readonly TypeSerializerClass[];
  /**
   * Overrides the validity flag.
   * By default a configuration is valid when it declares at least one model type.
   */
  readonly valid?: boolean;
}

/**
 * Creates a configuration.
 *
 * @example
 * ```typescript
 * const configuration = defineConfiguration({
 *   context,
 *   modelTypes: [Note, Tag],
 *   serializerTypes: [MoneySerializer],
 * });
 * ```
 */
export function defineConfiguration(options: ConfigurationOptions): Configuration {
  const modelTypes = options.modelTypes ?? [];
  return {
    context: options.context,
    valid: options.valid ?? modelTypes.length > 0,
    declaredEntityTypes: [...modelTypes],
    declaredSerializerTypes: [...(options.serializerTypes ?? [])],
  };
}

/**
 * Populates the registry from the declared lists of a valid configuration.
 *
 * Schema descriptor errors propagate to the caller. A serializer that
 * cannot be instantiated is recorded as failed and skipped.
 *
 * @returns whether the configuration was valid; when false nothing was registered
 * @throws {InvalidModelError} If a declared entity type is not a model
 */
export function loadFromConfiguration(
  configuration: Configuration,
  builder: RegistryBuilder,
  recorder: ScanRecorder
): boolean {
  if (!configuration.valid) {
    return false;
  }

  for (const type of configuration.declaredEntityTypes ?? []) {
    if (builder.addModel(type)) {
      recorder.registeredModel(type.name);
    }
  }

  for (const type of configuration.declaredSerializerTypes ?? []) {
    try {
      builder.putSerializer(instantiateSerializer(type));
      recorder.registeredSerializer(type.name);
    } catch (error) {
      recorder.failed(type.name, toError(error));
    }
  }

  return true;
}
