import { closeSync, fsyncSync, mkdirSync, openSync, renameSync, rmSync, writeSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { KIND_FOLDERS, fullName } from '../catalog/types.js';
import type { ObjectRef } from '../catalog/types.js';
import { sanitizeName } from './sanitize.js';

export const ARTIFACT_EXTENSION = '.sql';

/** Where and under which names one object is written. */
export interface ArtifactTarget {
  readonly outputRoot: string;
  readonly server: string;
  readonly database: string;
  readonly object: ObjectRef;
}

/** `<root>/<server>` with the server name sanitized. */
export function serverDirectory(outputRoot: string, server: string): string {
  return join(outputRoot, sanitizeName(server));
}

/** `<root>/<server>/<kind folder>/<database>/<schema.name>.sql` */
export function artifactPath(target: ArtifactTarget): string {
  return join(
    serverDirectory(target.outputRoot, target.server),
    KIND_FOLDERS[target.object.kind],
    target.database,
    `${sanitizeName(fullName(target.object))}${ARTIFACT_EXTENSION}`,
  );
}

/** Header lines followed by a blank line and the body, untouched. */
export function formatArtifact(database: string, object: ObjectRef, body: string, extractedAt: Date): string {
  return [
    `-- Extracted on ${extractedAt.toISOString()}`,
    `-- Database: ${database}`,
    `-- Object: ${fullName(object)}`,
    '',
    body,
  ].join('\n');
}

let tempCounter = 0;

/**
 * Write a file so that `path` only ever holds complete content:
 * the data goes to a temp file in the same directory which is then renamed over the target.
 * The temp name does not derive from the target's, so any name that fits on disk can be written.
 */
export function writeFileAtomic(path: string, content: string): void {
  const directory = dirname(path);
  mkdirSync(directory, { recursive: true });
  tempCounter += 1;
  const tempPath = join(directory, `.${String(process.pid)}-${String(tempCounter)}.tmp`);
  try {
    const fd = openSync(tempPath, 'w');
    try {
      writeSync(fd, content, null, 'utf-8');
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tempPath, path);
  } catch (error: unknown) {
    rmSync(tempPath, { force: true });
    throw error;
  }
}

/**
 * Persist one definition, replacing whatever was at the path before.
 * Returns the path written. Filesystem errors propagate.
 */
export function writeArtifact(target: ArtifactTarget, body: string, extractedAt: Date = new Date()): string {
  const path = artifactPath(target);
  writeFileAtomic(path, formatArtifact(target.database, target.object, body, extractedAt));
  return path;
}
