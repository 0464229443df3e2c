/**
 * modelscan - entity and serializer discovery for an object persistence layer
 *
 * This module provides the public API for the modelscan library.
 */

export const VERSION = '0.1.0' as const;

// Entity types
export {
  Model,
  MODEL_CAPABILITY,
  ABSTRACT_MODEL,
  isModel,
  isAbstractModel,
  TableInfo,
  InvalidModelError,
} from './model/index.js';
export type { ModelType, TableOptions } from './model/index.js';

// Serializers
export {
  TypeSerializer,
  SERIALIZER_CAPABILITY,
  isTypeSerializerClass,
  isTypeSerializer,
  CalendarSerializer,
  DateOnlySerializer,
  DateSerializer,
  FilePathSerializer,
  createBuiltinSerializers,
  Calendar,
  DateOnly,
  FilePath,
} from './serializers/index.js';
export type { ValueType, SerializedType, TypeSerializerClass } from './serializers/index.js';

// Registry
export { ModelRegistry, RegistryBuilder } from './registry/index.js';

// Discovery
export * from './discovery/index.js';
