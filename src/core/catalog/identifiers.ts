import { UnsafeIdentifierError } from '../errors.js';

const SAFE_IDENTIFIER = /^[\p{L}\p{N}_@#$ .-]{1,128}$/u;

/** Names that would step out of their folder when used as a path segment. */
const RELATIVE_PATH_NAMES = new Set(['.', '..']);

/**
 * Check an identifier against the characters allowed in statement text.
 * Database names also become directories, so `.` and `..` are refused.
 */
export function isSafeIdentifier(identifier: string): boolean {
  return SAFE_IDENTIFIER.test(identifier) && !RELATIVE_PATH_NAMES.has(identifier);
}

/**
 * Bracket-quote an identifier for a structural position (e.g. `[db].sys.objects`),
 * where it cannot be bound as a parameter.
 */
export function quoteIdentifier(identifier: string): string {
  if (!isSafeIdentifier(identifier)) {
    throw new UnsafeIdentifierError(identifier);
  }
  return `[${identifier}]`;
}
