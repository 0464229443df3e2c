/**
 * ModelRegistry - read-only lookup of entity and serializer registrations.
 */

import type { ModelType, TableInfo } from '../model/index.js';
import type { TypeSerializer, ValueType } from '../serializers/index.js';
import type { Configuration, DiscoveryOptions, ScanReport } from '../discovery/types.js';
import { runDiscovery } from '../discovery/scanner.js';
import { RegistryBuilder } from './registry-builder.js';

/**
 * The entity and serializer registries produced by one discovery pass.
 *
 * Instances are frozen; there is no way to add or remove entries after
 * initialization, so lookups need no coordination between readers.
 *
 * @example
 * ```typescript
 * const registry = await ModelRegistry.initialize(
 *   defineConfiguration({ context, modelTypes: [Note] })
 * );
 *
 * registry.getTableInfo(Note)?.tableName; // 'notes'
 * registry.getTypeSerializer(Date);       // DateSerializer
 * ```
 */
export class ModelRegistry {
  private readonly tableInfos: ReadonlyMap<ModelType, TableInfo>;
  private readonly serializers: ReadonlyMap<ValueType, TypeSerializer>;

  /** Report of the pass that built this registry. */
  readonly report: ScanReport;

  constructor(
    tableInfos: ReadonlyMap<ModelType, TableInfo>,
    serializers: ReadonlyMap<ValueType, TypeSerializer>,
    report: ScanReport
  ) {
    this.tableInfos = new Map(tableInfos);
    this.serializers = new Map(serializers);
    this.report = report;
    Object.freeze(this);
  }

  /**
   * Runs a full discovery pass and returns the resulting registry.
   *
   * Each call builds a new registry from scratch, starting from the
   * built-in serializers.
   *
   * @throws {MissingSecondaryArtifactError} If the deployment is missing a secondary unit
   * @throws {PreferencesError} If the unit counter cannot be read
   * @throws {InvalidModelError} If a declared entity type is not a model
   */
  static async initialize(configuration: Configuration, options: DiscoveryOptions = {}): Promise<ModelRegistry> {
    const builder = new RegistryBuilder();
    const report = await runDiscovery(configuration, builder, options);
    const { tableInfos, serializers } = builder.snapshot();
    return new ModelRegistry(tableInfos, serializers, report);
  }

  /**
   * Returns the schema descriptors of all registered entity types.
   */
  getTableInfos(): readonly TableInfo[] {
    return [...this.tableInfos.values()];
  }

  /**
   * Returns the schema descriptor of an entity type, or undefined.
   */
  getTableInfo(type: ModelType): TableInfo | undefined {
    return this.tableInfos.get(type);
  }

  hasModel(type: ModelType): boolean {
    return this.tableInfos.has(type);
  }

  /**
   * Returns the serializer registered for a value type, or undefined.
   */
  getTypeSerializer(type: ValueType): TypeSerializer | undefined {
    return this.serializers.get(type);
  }

  /**
   * Returns every registered serializer.
   */
  getTypeSerializers(): readonly TypeSerializer[] {
    return [...this.serializers.values()];
  }
}
