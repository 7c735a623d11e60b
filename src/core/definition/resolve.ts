import { z } from 'zod/v4';
import { describeError } from '../errors.js';
import type { Logger } from '../../util/logger.js';
import { silentLogger } from '../../util/logger.js';
import type { SqlSession } from '../connection/session.js';
import { moduleDefinitionQuery, OBJECT_TYPE_CODES } from '../catalog/queries.js';
import { KIND_LABELS, fullName } from '../catalog/types.js';
import type { DefinitionResult, ObjectRef } from '../catalog/types.js';
import { synthesizeTableDdl } from './synthesize.js';

const definitionRowSchema = z.object({ definition: z.string().nullable() });

/**
 * Placeholder body for an object whose definition could not be obtained.
 * Every line is a comment, including each line of a multi-line error.
 */
export function unavailablePlaceholder(ref: ObjectRef, error?: string): string {
  const name = fullName(ref);
  if (ref.kind !== 'table') {
    return `-- Could not extract ${KIND_LABELS[ref.kind]} definition for ${name}`;
  }
  const lines = [`-- Could not extract DDL for ${name}`];
  if (error !== undefined) {
    const [first = '', ...rest] = error.split(/\r?\n/);
    lines.push(`-- Error: ${first}`, ...rest.map((line) => `-- ${line}`));
  }
  return lines.join('\n');
}

/**
 * Produces a definition for every object it is asked about.
 * Absence and failure come back as `source: 'unavailable'`; the promise never rejects.
 */
export class DefinitionResolver {
  constructor(
    private readonly session: SqlSession,
    private readonly logger: Logger = silentLogger,
  ) {}

  async resolve(database: string, ref: ObjectRef): Promise<DefinitionResult> {
    if (ref.kind === 'table') {
      return this.resolveTable(database, ref);
    }
    return this.resolveModule(database, ref);
  }

  private async resolveModule(database: string, ref: ObjectRef): Promise<DefinitionResult> {
    try {
      const text = await this.lookupModuleDefinition(database, ref);
      if (text !== null) {
        return { object: ref, text, source: 'native' };
      }
    } catch (error: unknown) {
      this.logger.warn(
        `Could not extract ${KIND_LABELS[ref.kind]} definition for ${fullName(ref)}: ${describeError(error)}`,
      );
    }
    return { object: ref, text: unavailablePlaceholder(ref), source: 'unavailable' };
  }

  private async resolveTable(database: string, ref: ObjectRef): Promise<DefinitionResult> {
    try {
      const native = await this.lookupModuleDefinition(database, ref);
      if (native !== null) {
        return { object: ref, text: native, source: 'native' };
      }
      const text = await synthesizeTableDdl(this.session, database, ref.schema, ref.name);
      return { object: ref, text, source: 'synthesized' };
    } catch (error: unknown) {
      const detail = describeError(error);
      this.logger.warn(`Could not extract DDL for ${fullName(ref)}: ${detail}`);
      return { object: ref, text: unavailablePlaceholder(ref, detail), source: 'unavailable' };
    }
  }

  /** Stored text for the object, or null when the server has none. */
  private async lookupModuleDefinition(database: string, ref: ObjectRef): Promise<string | null> {
    const rows = await this.session.query(
      moduleDefinitionQuery(database, ref.schema, ref.name, OBJECT_TYPE_CODES[ref.kind]),
    );
    const first = z.array(definitionRowSchema).parse(rows)[0];
    if (first === undefined || first.definition === null || first.definition === '') {
      return null;
    }
    return first.definition;
  }
}
