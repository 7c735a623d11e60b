import { z } from 'zod/v4';

/**
 * Zod schema for `config.json`. Every key is optional; command-line flags
 * fill or override them.
 */
export const configFileSchema = z
  .object({
    server: z.string().min(1),
    username: z.string().min(1),
    password: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    output_dir: z.string().min(1),
    trust_cert: z.boolean(),
    log_file: z.string().min(1),
    connection_timeout_ms: z.number().int().positive(),
    query_timeout_ms: z.number().int().positive(),
  })
  .partial()
  .strict();

/** Parsed type for the config file. */
export type ConfigFile = z.infer<typeof configFileSchema>;

export const DEFAULT_PORT = 1433;
export const DEFAULT_OUTPUT_DIR = 'sql_extracted_objects';
export const DEFAULT_LOG_FILE = 'sql_extractor.log';
export const DEFAULT_CONFIG_FILE = 'config.json';
export const DEFAULT_CONNECTION_TIMEOUT_MS = 30_000;
export const DEFAULT_QUERY_TIMEOUT_MS = 30_000;
