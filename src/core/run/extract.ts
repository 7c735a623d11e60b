import { CatalogReader } from '../catalog/reader.js';
import { KIND_LABELS, OBJECT_KINDS, fullName } from '../catalog/types.js';
import type { ObjectRef } from '../catalog/types.js';
import { connectSqlServer } from '../connection/connect.js';
import type { ConnectionOptions, ConnectionProvider, SqlSession } from '../connection/session.js';
import { DefinitionResolver } from '../definition/resolve.js';
import { describeError } from '../errors.js';
import { artifactPath, writeArtifact } from '../output/writeArtifact.js';
import type { Logger } from '../../util/logger.js';
import { silentLogger } from '../../util/logger.js';

/** Where a run is. Terminal phases are also the run's status. */
export type RunPhase =
  | 'idle'
  | 'connected'
  | 'database'
  | 'kind'
  | 'object'
  | 'completed'
  | 'failed'
  | 'cancelled';

export type RunStatus = Extract<RunPhase, 'completed' | 'failed' | 'cancelled'>;

export interface ExtractionOptions {
  readonly connection: ConnectionOptions;
  readonly outputRoot: string;
  /** Defaults to the mssql-backed provider. */
  readonly connect?: ConnectionProvider | undefined;
  readonly logger?: Logger | undefined;
  /** Checked between objects; an aborted run stops with status 'cancelled'. */
  readonly signal?: AbortSignal | undefined;
  readonly now?: (() => Date) | undefined;
}

export interface DatabaseOutcome {
  readonly name: string;
  /** 'partial' when the run was cancelled while the database was being extracted. */
  readonly status: 'extracted' | 'partial' | 'skipped';
  readonly error: string | null;
}

export interface ExtractionOutcome {
  readonly status: RunStatus;
  /** Set when status is 'failed'. */
  readonly error: string | null;
  readonly databases: readonly DatabaseOutcome[];
  readonly objectsWritten: number;
  readonly objectsFailed: number;
  readonly placeholders: number;
  readonly collisions: number;
}

class ExtractionRun {
  private phase: RunPhase = 'idle';
  private readonly databases: DatabaseOutcome[] = [];
  private objectsWritten = 0;
  private objectsFailed = 0;
  private placeholders = 0;
  private collisions = 0;
  /** Path written this run → the object that produced it. */
  private readonly writtenPaths = new Map<string, string>();
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: ExtractionOptions) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  async run(): Promise<ExtractionOutcome> {
    const connect = this.options.connect ?? connectSqlServer;
    const server = this.options.connection.server;

    this.logger.info(`Connecting to SQL Server: ${server}`);
    let session: SqlSession;
    try {
      session = await connect(this.options.connection);
    } catch (error: unknown) {
      this.logger.error(`Failed to connect to SQL Server: ${describeError(error)}`);
      return this.finish('failed', describeError(error));
    }
    this.enter('connected');
    this.logger.info('Successfully connected to SQL Server');

    try {
      return await this.extractDatabases(session);
    } catch (error: unknown) {
      this.logger.error(`Error during extraction: ${describeError(error)}`);
      return this.finish('failed', describeError(error));
    } finally {
      try {
        await session.close();
      } catch (error: unknown) {
        this.logger.warn(`Failed to close connection: ${describeError(error)}`);
      }
    }
  }

  private async extractDatabases(session: SqlSession): Promise<ExtractionOutcome> {
    const reader = new CatalogReader(session, this.logger);
    const resolver = new DefinitionResolver(session, this.logger);
    const databases = await reader.listDatabases();

    for (const database of databases) {
      if (this.isCancelled()) {
        return this.cancel();
      }
      this.enter('database');
      this.logger.info(`Processing database: ${database}`);
      try {
        const finished = await this.extractDatabase(reader, resolver, database);
        if (!finished) {
          this.databases.push({ name: database, status: 'partial', error: null });
          return this.cancel();
        }
        this.databases.push({ name: database, status: 'extracted', error: null });
        this.logger.info(`Completed extraction for database: ${database}`);
      } catch (error: unknown) {
        const detail = describeError(error);
        this.logger.warn(`Skipping database ${database}: ${detail}`);
        this.databases.push({ name: database, status: 'skipped', error: detail });
      }
    }

    this.logger.info('Extraction completed successfully');
    return this.finish('completed', null);
  }

  /** Returns false when the run was cancelled part way through. */
  private async extractDatabase(
    reader: CatalogReader,
    resolver: DefinitionResolver,
    database: string,
  ): Promise<boolean> {
    for (const kind of OBJECT_KINDS) {
      this.enter('kind');
      const objects = await reader.listObjectsOfKind(database, kind);
      for (const object of objects) {
        if (this.isCancelled()) {
          return false;
        }
        this.enter('object');
        await this.extractObject(resolver, database, object);
      }
    }
    return true;
  }

  private async extractObject(resolver: DefinitionResolver, database: string, object: ObjectRef): Promise<void> {
    const name = fullName(object);
    try {
      const definition = await resolver.resolve(database, object);
      const target = {
        outputRoot: this.options.outputRoot,
        server: this.options.connection.server,
        database,
        object,
      };
      this.recordPath(artifactPath(target), name);
      const path = writeArtifact(target, definition.text, this.now());
      this.objectsWritten += 1;
      if (definition.source === 'unavailable') {
        this.placeholders += 1;
      }
      this.logger.debug(`Saved ${name} to ${path}`);
    } catch (error: unknown) {
      this.objectsFailed += 1;
      this.logger.error(
        `Failed to extract ${KIND_LABELS[object.kind]} ${name} in ${database}: ${describeError(error)}`,
      );
    }
  }

  private recordPath(path: string, name: string): void {
    const previous = this.writtenPaths.get(path);
    if (previous !== undefined && previous !== name) {
      this.collisions += 1;
      this.logger.warn(`Sanitized name collision: ${name} overwrites ${previous} at ${path}`);
    }
    this.writtenPaths.set(path, name);
  }

  private isCancelled(): boolean {
    return this.options.signal?.aborted === true;
  }

  private cancel(): ExtractionOutcome {
    this.logger.warn('Extraction cancelled; artifacts written so far are complete');
    return this.finish('cancelled', null);
  }

  private enter(phase: RunPhase): void {
    if (phase !== this.phase) {
      this.logger.debug(`Run phase: ${this.phase} -> ${phase}`);
    }
    this.phase = phase;
  }

  private finish(status: RunStatus, error: string | null): ExtractionOutcome {
    this.enter(status);
    return {
      status,
      error,
      databases: [...this.databases],
      objectsWritten: this.objectsWritten,
      objectsFailed: this.objectsFailed,
      placeholders: this.placeholders,
      collisions: this.collisions,
    };
  }
}

/**
 * Extract every table, view and stored procedure of every online user database.
 *
 * Only a failed connection (or a failed database listing) fails the run.
 * Database enumeration errors skip that database; object errors skip that object.
 * The session is opened and closed here.
 */
export function extractAll(options: ExtractionOptions): Promise<ExtractionOutcome> {
  return new ExtractionRun(options).run();
}
