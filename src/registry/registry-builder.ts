import { InvalidModelError, TableInfo, isAbstractModel, type ModelType } from '../model/index.js';
import {
  createBuiltinSerializers,
  type TypeSerializer,
  type ValueType,
} from '../serializers/index.js';

/**
 * Mutable registry state used during a single discovery pass.
 *
 * Starts from the built-in serializers. Entity types are registered at
 * most once; serializers overwrite earlier ones for the same value type.
 */
export class RegistryBuilder {
  private readonly tableInfos = new Map<ModelType, TableInfo>();
  private readonly serializers: Map<ValueType, TypeSerializer>;

  constructor(builtins: ReadonlyMap<ValueType, TypeSerializer> = createBuiltinSerializers()) {
    this.serializers = new Map(builtins);
  }

  hasModel(type: ModelType): boolean {
    return this.tableInfos.has(type);
  }

  /**
   * Builds and stores the schema descriptor of an entity type.
   *
   * @returns false if the type was already registered
   * @throws {InvalidModelError} If `type` is not an entity type or is abstract
   */
  addModel(type: ModelType): boolean {
    if (isAbstractModel(type)) {
      throw new InvalidModelError(type.name, `Abstract model type: ${type.name}`);
    }
    if (this.tableInfos.has(type)) {
      return false;
    }
    this.tableInfos.set(type, new TableInfo(type));
    return true;
  }

  /**
   * Stores a serializer under the value type it handles.
   *
   * @returns the serializer it replaced, if any
   */
  putSerializer(serializer: TypeSerializer): TypeSerializer | undefined {
    const previous = this.serializers.get(serializer.deserializedType);
    this.serializers.set(serializer.deserializedType, serializer);
    return previous;
  }

  /**
   * Returns copies of the current mappings.
   */
  snapshot(): {
    readonly tableInfos: ReadonlyMap<ModelType, TableInfo>;
    readonly serializers: ReadonlyMap<ValueType, TypeSerializer>;
  } {
    return {
      tableInfos: new Map(this.tableInfos),
      serializers: new Map(this.serializers),
    };
  }
}
