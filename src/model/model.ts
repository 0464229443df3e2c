/**
 * Entity capability.
 *
 * A class takes part in entity discovery by extending `Model`, which
 * carries the `MODEL_CAPABILITY` marker on its constructor. Subclasses
 * inherit the marker. A class that should never be registered must
 * declare its own `ABSTRACT_MODEL` marker. The TypeScript `abstract`
 * modifier is erased at compile time and is not enough: an `abstract`
 * subclass without the marker counts as concrete. The marker is checked
 * as an own property, so concrete subclasses of an abstract model are
 * registered.
 *
 * @example
 * ```typescript
 * export abstract class Timestamped extends Model {
 *   static override readonly [ABSTRACT_MODEL] = true;
 * }
 *
 * export class Note extends Timestamped {
 *   static override readonly table = { name: 'notes' };
 * }
 * ```
 */

/** Marks a constructor as an entity type. */
export const MODEL_CAPABILITY: unique symbol = Symbol.for('modelscan.model');

/** Marks a constructor as an abstract entity type. */
export const ABSTRACT_MODEL: unique symbol = Symbol.for('modelscan.abstract-model');

/**
 * Table options an entity type may declare statically.
 */
export interface TableOptions {
  /** Table name. Defaults to the class name. */
  readonly name?: string;
  /** Primary key column name. Defaults to `Id`. */
  readonly id?: string;
}

/**
 * Base class of every persistable entity.
 */
export abstract class Model {
  static readonly [MODEL_CAPABILITY] = true;
  static readonly [ABSTRACT_MODEL] = true;

  /** Optional table options, read when the schema descriptor is built. */
  static readonly table: TableOptions | undefined = undefined;

  id: number | undefined = undefined;
}

/**
 * Constructor of a concrete or abstract entity type.
 */
export type ModelType<T extends Model = Model> = (abstract new (...args: never[]) => T) & {
  readonly table?: TableOptions | undefined;
};

/**
 * Checks whether a value is a constructor carrying the entity capability.
 */
export function isModel(value: unknown): value is ModelType {
  return (
    typeof value === 'function' &&
    MODEL_CAPABILITY in value &&
    value[MODEL_CAPABILITY] === true
  );
}

/**
 * Checks whether an entity type declares itself abstract.
 */
export function isAbstractModel(type: ModelType): boolean {
  return Object.prototype.hasOwnProperty.call(type, ABSTRACT_MODEL);
}
