/**
 * Thrown when a schema descriptor is requested for a value that is
 * not an entity type, or when an abstract entity type is registered.
 */
export class InvalidModelError extends Error {
  override readonly name = 'InvalidModelError' as const;

  constructor(
    readonly typeName: string,
    message = `Not a model type: ${typeName}`
  ) {
    super(message);
  }
}
