import { isModel, type ModelType } from './model.js';
import { InvalidModelError } from './errors.js';

const DEFAULT_ID_NAME = 'Id';

/**
 * Schema descriptor of one entity type.
 *
 * Column mapping lives with the query layer; this descriptor carries
 * what the registry needs to key and name the table.
 */
export class TableInfo {
  readonly type: ModelType;
  readonly tableName: string;
  readonly idName: string;

  /**
   * @throws {InvalidModelError} If `type` does not carry the entity capability
   */
  constructor(type: unknown) {
    if (!isModel(type)) {
      throw new InvalidModelError(describeValue(type));
    }

    this.type = type;
    this.tableName = type.table?.name ?? type.name;
    this.idName = type.table?.id ?? DEFAULT_ID_NAME;
  }
}

function describeValue(value: unknown): string {
  if (typeof value === 'function') {
    return value.name === '' ? '<anonymous>' : value.name;
  }
  return String(value);
}
