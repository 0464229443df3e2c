/**
 * Conversions from compiled-unit paths to dotted type names.
 */

/**
 * Returns the compiled-unit suffix a path ends in, if any.
 */
function unitSuffix(path: string, unitExtensions: readonly string[]): string | undefined {
  return unitExtensions.find((extension) => path.endsWith(extension));
}

/**
 * Converts an archive entry name such as `acme/notes/Note.js` to
 * `acme.notes.Note`. Returns undefined for entries that are not
 * compiled units.
 */
export function entryToTypeName(entryName: string, unitExtensions: readonly string[]): string | undefined {
  const suffix = unitSuffix(entryName, unitExtensions);
  if (suffix === undefined) {
    return undefined;
  }
  const name = entryName
    .slice(0, -suffix.length)
    .split('/')
    .filter((segment) => segment !== '')
    .join('.');
  return name === '' ? undefined : name;
}

/**
 * Result of reconstructing a type name from a filesystem path.
 */
export type ReconstructedName =
  | { readonly ok: true; readonly name: string }
  | { readonly ok: false; readonly reason: 'not-a-unit' | 'outside-package' };

/**
 * Reconstructs a dotted type name from a compiled-unit path.
 *
 * The suffix is stripped, path separators become dots and everything
 * before the leftmost occurrence of `packageName` is dropped.
 *
 * @example
 * ```typescript
 * reconstructTypeName('/srv/app/dist/acme/notes/Note.js', 'acme.notes', ['.js']);
 * // { ok: true, name: 'acme.notes.Note' }
 * ```
 */
export function reconstructTypeName(
  path: string,
  packageName: string,
  unitExtensions: readonly string[]
): ReconstructedName {
  const suffix = unitSuffix(path, unitExtensions);
  if (suffix === undefined) {
    return { ok: false, reason: 'not-a-unit' };
  }

  const dotted = path.slice(0, -suffix.length).replace(/[\\/]/g, '.');
  const index = dotted.indexOf(packageName);
  if (index < 0) {
    return { ok: false, reason: 'outside-package' };
  }
  return { ok: true, name: dotted.slice(index) };
}
