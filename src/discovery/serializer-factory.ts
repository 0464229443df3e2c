import { isModel } from '../model/index.js';
import {
  isTypeSerializer,
  type TypeSerializer,
  type TypeSerializerClass,
} from '../serializers/index.js';
import { SerializerInstantiationError, toError } from './errors.js';

/**
 * Constructs a serializer type with no arguments and checks the result.
 *
 * @throws {SerializerInstantiationError} If construction throws, the
 *   instance does not fulfil the serializer contract, or it declares an
 *   entity type as its value type
 */
export function instantiateSerializer(type: TypeSerializerClass, typeName: string = type.name): TypeSerializer {
  let instance: unknown;
  try {
    instance = new type();
  } catch (error) {
    throw new SerializerInstantiationError(typeName, 'constructor threw', toError(error));
  }

  if (!isTypeSerializer(instance)) {
    throw new SerializerInstantiationError(typeName, 'instance does not declare a deserialized type');
  }
  if (isModel(instance.deserializedType)) {
    throw new SerializerInstantiationError(
      typeName,
      `deserialized type ${instance.deserializedType.name} is a model`
    );
  }
  return instance;
}
