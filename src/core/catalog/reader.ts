import { z } from 'zod/v4';
import { ConnectionUnavailableError } from '../errors.js';
import { sortBy } from '../../util/index.js';
import type { Logger } from '../../util/logger.js';
import { silentLogger } from '../../util/logger.js';
import type { SqlSession, SqlStatement } from '../connection/session.js';
import {
  listDatabasesQuery,
  listProceduresQuery,
  listTablesQuery,
  listViewsQuery,
} from './queries.js';
import { KIND_LABELS } from './types.js';
import type { ObjectKind, ObjectRef } from './types.js';

const databaseRowSchema = z.object({ name: z.string() });

const objectRowSchema = z.object({
  schema: z.string(),
  name: z.string(),
});

/**
 * Enumerates databases and the objects inside them.
 * Issues read-only metadata queries over the session it is given.
 */
export class CatalogReader {
  constructor(
    private readonly session: SqlSession,
    private readonly logger: Logger = silentLogger,
  ) {}

  /** Online user databases, ordered by name. */
  async listDatabases(): Promise<string[]> {
    this.assertOpen();
    const rows = await this.session.query(listDatabasesQuery());
    const databases = z.array(databaseRowSchema).parse(rows).map((row) => row.name);
    this.logger.info(`Found ${String(databases.length)} user databases`);
    return databases;
  }

  listTables(database: string): Promise<ObjectRef[]> {
    return this.listObjects(database, 'table', listTablesQuery);
  }

  listViews(database: string): Promise<ObjectRef[]> {
    return this.listObjects(database, 'view', listViewsQuery);
  }

  listProcedures(database: string): Promise<ObjectRef[]> {
    return this.listObjects(database, 'procedure', listProceduresQuery);
  }

  /** Dispatch on kind; used by the orchestrator's fixed kind loop. */
  listObjectsOfKind(database: string, kind: ObjectKind): Promise<ObjectRef[]> {
    switch (kind) {
      case 'table':
        return this.listTables(database);
      case 'view':
        return this.listViews(database);
      case 'procedure':
        return this.listProcedures(database);
    }
  }

  private async listObjects(
    database: string,
    kind: ObjectKind,
    buildQuery: (database: string) => SqlStatement,
  ): Promise<ObjectRef[]> {
    this.assertOpen();
    const rows = await this.session.query(buildQuery(database));
    const refs = z
      .array(objectRowSchema)
      .parse(rows)
      .map((row): ObjectRef => ({ schema: row.schema, name: row.name, kind }));
    // Server collation decides ORDER BY; re-sort so runs agree across servers.
    const ordered = sortBy(refs, (ref) => [ref.schema, ref.name]);
    this.logger.info(`Found ${String(ordered.length)} ${KIND_LABELS[kind]}s in ${database}`);
    return ordered;
  }

  private assertOpen(): void {
    if (!this.session.isOpen) {
      throw new ConnectionUnavailableError();
    }
  }
}
