/**
 * Value serializers.
 *
 * @module serializers
 */

export {
  TypeSerializer,
  SERIALIZER_CAPABILITY,
  isTypeSerializerClass,
  isTypeSerializer,
} from './type-serializer.js';
export type { ValueType, SerializedType, TypeSerializerClass } from './type-serializer.js';
export {
  CalendarSerializer,
  DateOnlySerializer,
  DateSerializer,
  FilePathSerializer,
  createBuiltinSerializers,
} from './builtins.js';
export { Calendar, DateOnly, FilePath } from './values.js';
