const UNSAFE_PATH_CHARACTERS = /[\\/:]/g;

/**
 * Make a name usable as a single path component by replacing `\`, `/` and `:` with `_`.
 * Idempotent. Distinct names can map to the same result; see `ArtifactTarget` collisions.
 */
export function sanitizeName(name: string): string {
  return name.replace(UNSAFE_PATH_CHARACTERS, '_');
}
