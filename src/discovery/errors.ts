/**
 * Discovery error classes.
 *
 * Only `MissingSecondaryArtifactError` and `PreferencesError` abort a
 * discovery pass. The others are absorbed per location or per candidate
 * and end up in the scan report.
 */

/**
 * Thrown when a secondary artifact recorded by the deployment counter
 * is not present on disk.
 */
export class MissingSecondaryArtifactError extends Error {
  override readonly name = 'MissingSecondaryArtifactError' as const;

  constructor(
    readonly expectedPath: string,
    readonly sequenceNumber: number
  ) {
    super(`Missing extracted secondary artifact '${expectedPath}'`);
  }
}

/**
 * Thrown when the preference store holding the secondary unit counter
 * cannot be read.
 */
export class PreferencesError extends Error {
  override readonly name = 'PreferencesError' as const;
  override readonly cause: Error | undefined;

  constructor(
    readonly storeName: string,
    message: string,
    cause?: Error
  ) {
    super(`Preferences '${storeName}': ${message}`);
    this.cause = cause;
  }
}

/**
 * Thrown when an artifact location cannot be opened or listed.
 */
export class ArtifactReadError extends Error {
  override readonly name = 'ArtifactReadError' as const;
  override readonly cause: Error | undefined;

  constructor(
    readonly location: string,
    cause?: Error
  ) {
    super(`Couldn't open source path: ${location}`);
    this.cause = cause;
  }
}

/**
 * Thrown by a type loader when no module matches a type name.
 */
export class TypeNotFoundError extends Error {
  override readonly name = 'TypeNotFoundError' as const;

  constructor(readonly typeName: string) {
    super(`Type not found: ${typeName}`);
  }
}

/**
 * Thrown when a module resolved for a type name fails to load.
 */
export class TypeLoadError extends Error {
  override readonly name = 'TypeLoadError' as const;
  override readonly cause: Error | undefined;

  constructor(
    readonly typeName: string,
    cause?: Error
  ) {
    super(`Couldn't load type: ${typeName}`);
    this.cause = cause;
  }
}

/**
 * Thrown when a serializer type cannot be constructed or does not
 * declare the value type it handles.
 */
export class SerializerInstantiationError extends Error {
  override readonly name = 'SerializerInstantiationError' as const;
  override readonly cause: Error | undefined;

  constructor(
    readonly typeName: string,
    reason: string,
    cause?: Error
  ) {
    super(`Couldn't instantiate TypeSerializer ${typeName}: ${reason}`);
    this.cause = cause;
  }
}

/**
 * Normalizes an unknown thrown value into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
