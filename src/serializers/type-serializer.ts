/**
 * Serializer capability.
 *
 * Custom serializers extend `TypeSerializer`, declare the value type
 * they handle and must be constructible without arguments, since
 * discovery instantiates them with `new Type()`.
 */

/** Marks a constructor as a serializer type. */
export const SERIALIZER_CAPABILITY: unique symbol = Symbol.for('modelscan.type-serializer');

/**
 * Constructor used as a registry key for values of that type.
 */
export type ValueType = abstract new (...args: never[]) => unknown;

/**
 * Storage kind a serializer produces.
 */
export type SerializedType = 'integer' | 'real' | 'text' | 'blob';

/**
 * Converts values of one type to a storable representation and back.
 *
 * @typeParam TValue - Application-side value
 * @typeParam TData - Stored representation
 */
export abstract class TypeSerializer<TValue = unknown, TData = unknown> {
  static readonly [SERIALIZER_CAPABILITY] = true;

  /** Value type this serializer handles. */
  abstract readonly deserializedType: ValueType;

  abstract readonly serializedType: SerializedType;

  abstract serialize(value: TValue | null): TData | null;

  abstract deserialize(data: TData | null): TValue | null;
}

/**
 * Constructor of a concrete serializer.
 */
export type TypeSerializerClass = new () => TypeSerializer;

/**
 * Checks whether a value is a constructor carrying the serializer capability.
 */
export function isTypeSerializerClass(value: unknown): value is TypeSerializerClass {
  return (
    typeof value === 'function' &&
    SERIALIZER_CAPABILITY in value &&
    value[SERIALIZER_CAPABILITY] === true
  );
}

/**
 * Checks whether a constructed value fulfils the serializer contract.
 */
export function isTypeSerializer(value: unknown): value is TypeSerializer {
  return (
    value !== null &&
    typeof value === 'object' &&
    'deserializedType' in value &&
    typeof value.deserializedType === 'function' &&
    'serialize' in value &&
    typeof value.serialize === 'function' &&
    'deserialize' in value &&
    typeof value.deserialize === 'function'
  );
}
