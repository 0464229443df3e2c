/**
 * Type classification and registration.
 */

import { isAbstractModel, isModel } from '../model/index.js';
import { isTypeSerializerClass } from '../serializers/index.js';
import type { RegistryBuilder } from '../registry/registry-builder.js';
import type { TypeLoader } from './types.js';
import type { ScanRecorder } from './scan-recorder.js';
import { instantiateSerializer } from './serializer-factory.js';
import { toError } from './errors.js';

/**
 * Loads one candidate type and registers it if it carries a capability.
 *
 * Concrete entity types are registered once, keyed by themselves.
 * Otherwise serializer types are instantiated and registered under
 * their value type, replacing any earlier serializer. Every failure is
 * recorded and never thrown.
 */
export async function classifyCandidate(
  typeName: string,
  loader: TypeLoader,
  builder: RegistryBuilder,
  recorder: ScanRecorder
): Promise<void> {
  try {
    const value = await loader.load(typeName);

    if (isModel(value) && !isAbstractModel(value)) {
      if (builder.addModel(value)) {
        recorder.registeredModel(typeName);
      } else {
        recorder.skipped(typeName, 'already registered');
      }
      return;
    }

    if (isTypeSerializerClass(value)) {
      builder.putSerializer(instantiateSerializer(value, typeName));
      recorder.registeredSerializer(typeName);
      return;
    }

    recorder.skipped(typeName, isModel(value) ? 'abstract model' : 'no capability');
  } catch (error) {
    recorder.failed(typeName, toError(error));
  }
}
