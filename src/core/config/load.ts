import { existsSync, readFileSync } from 'node:fs';
import { ConfigError, describeError } from '../errors.js';
import { configFileSchema } from './schema.js';
import type { ConfigFile } from './schema.js';
import {
  DEFAULT_CONNECTION_TIMEOUT_MS,
  DEFAULT_LOG_FILE,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_PORT,
  DEFAULT_QUERY_TIMEOUT_MS,
} from './schema.js';

/**
 * Read and validate a config file. A missing file is an empty config;
 * an unreadable or invalid one throws ConfigError.
 */
export function loadConfigFile(filePath: string): ConfigFile {
  if (!existsSync(filePath)) {
    return {};
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error: unknown) {
    throw new ConfigError(`Could not read config file ${filePath}: ${describeError(error)}`, { cause: error });
  }
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file ${filePath}: ${issues}`);
  }
  return parsed.data;
}

/** Values given on the command line; undefined means "not given". */
export interface ConfigOverrides {
  readonly server?: string | undefined;
  readonly username?: string | undefined;
  readonly password?: string | undefined;
  readonly port?: number | undefined;
  readonly outputDir?: string | undefined;
  readonly noTrustCert?: boolean | undefined;
  readonly logFile?: string | undefined;
}

/** Settings after merging flags over the file over defaults. */
export interface ResolvedConfig {
  readonly server: string | undefined;
  readonly username: string | undefined;
  readonly password: string | undefined;
  readonly port: number;
  readonly outputDir: string;
  readonly trustCert: boolean;
  readonly logFile: string;
  readonly connectionTimeoutMs: number;
  readonly queryTimeoutMs: number;
}

export function resolveConfig(file: ConfigFile, overrides: ConfigOverrides): ResolvedConfig {
  return {
    server: overrides.server ?? file.server,
    username: overrides.username ?? file.username,
    password: overrides.password ?? file.password,
    port: overrides.port ?? file.port ?? DEFAULT_PORT,
    outputDir: overrides.outputDir ?? file.output_dir ?? DEFAULT_OUTPUT_DIR,
    trustCert: overrides.noTrustCert !== true && (file.trust_cert ?? true),
    logFile: overrides.logFile ?? file.log_file ?? DEFAULT_LOG_FILE,
    connectionTimeoutMs: file.connection_timeout_ms ?? DEFAULT_CONNECTION_TIMEOUT_MS,
    queryTimeoutMs: file.query_timeout_ms ?? DEFAULT_QUERY_TIMEOUT_MS,
  };
}
