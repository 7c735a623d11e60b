import mssql from 'mssql';
import { ConnectionError, describeError } from '../errors.js';
import type { ConnectionOptions, SqlRow, SqlSession, SqlStatement } from './session.js';

/** Split `HOST\INSTANCE` into its parts. A plain host has no instance. */
export function parseServerAddress(server: string): { host: string; instanceName: string | null } {
  const separator = server.indexOf('\\');
  if (separator === -1) {
    return { host: server, instanceName: null };
  }
  return {
    host: server.slice(0, separator),
    instanceName: server.slice(separator + 1),
  };
}

/** Translate connection options into an mssql pool configuration. */
export function toPoolConfig(options: ConnectionOptions): mssql.config {
  const { host, instanceName } = parseServerAddress(options.server);
  const config: mssql.config = {
    server: host,
    user: options.username,
    password: options.password,
    database: 'master',
    connectionTimeout: options.connectionTimeoutMs,
    requestTimeout: options.queryTimeoutMs,
    // One connection: every statement of a run goes through the same session.
    pool: { min: 0, max: 1 },
    options: {
      encrypt: true,
      trustServerCertificate: options.trustServerCertificate,
      ...(instanceName !== null ? { instanceName } : {}),
    },
  };
  // A named instance is located through the browser service, not a fixed port.
  if (instanceName === null) {
    config.port = options.port;
  }
  return config;
}

class MssqlSession implements SqlSession {
  constructor(private readonly pool: mssql.ConnectionPool) {}

  get isOpen(): boolean {
    return this.pool.connected;
  }

  async query(statement: SqlStatement): Promise<readonly SqlRow[]> {
    const request = this.pool.request();
    for (const [name, value] of Object.entries(statement.params ?? {})) {
      request.input(name, mssql.NVarChar, value);
    }
    const result = await request.query<SqlRow>(statement.text);
    return [...result.recordset];
  }

  async close(): Promise<void> {
    await this.pool.close();
  }
}

/** Open a session against SQL Server using the tedious-backed mssql driver. */
export async function connectSqlServer(options: ConnectionOptions): Promise<SqlSession> {
  const pool = new mssql.ConnectionPool(toPoolConfig(options));
  try {
    await pool.connect();
  } catch (error: unknown) {
    throw new ConnectionError(`Database connection failed: ${describeError(error)}`, { cause: error });
  }
  return new MssqlSession(pool);
}
