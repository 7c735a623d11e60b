/** A parameterized statement. Parameters are bound as NVARCHAR. */
export interface SqlStatement {
  readonly text: string;
  readonly params?: Readonly<Record<string, string>> | undefined;
}

/** A row as returned by the driver, before validation. */
export type SqlRow = Readonly<Record<string, unknown>>;

/**
 * A live, authenticated handle to the server.
 * Owned by whoever acquired it; components that only read receive it as a value.
 */
export interface SqlSession {
  readonly isOpen: boolean;
  query(statement: SqlStatement): Promise<readonly SqlRow[]>;
  close(): Promise<void>;
}

/** Settings needed to open a session. */
export interface ConnectionOptions {
  readonly server: string;
  readonly port: number;
  readonly username: string;
  readonly password: string;
  readonly trustServerCertificate: boolean;
  readonly connectionTimeoutMs: number;
  readonly queryTimeoutMs: number;
}

/** Opens a session or rejects with a ConnectionError. */
export type ConnectionProvider = (options: ConnectionOptions) => Promise<SqlSession>;
