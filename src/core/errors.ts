/** Base class for every error raised by the extractor. */
export class ExtractorError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The server could not be reached or refused the login. */
export class ConnectionError extends ExtractorError {}

/** A catalog call was made without an open session. */
export class ConnectionUnavailableError extends ExtractorError {
  constructor() {
    super('Not connected to database');
  }
}

/** An identifier that must be embedded in statement text failed the allow-list. */
export class UnsafeIdentifierError extends ExtractorError {
  readonly identifier: string;

  constructor(identifier: string) {
    super(`Refusing to embed identifier ${JSON.stringify(identifier)} in a statement`);
    this.identifier = identifier;
  }
}

/** The configuration file is unreadable or does not match the expected shape. */
export class ConfigError extends ExtractorError {}

/** Render any thrown value as a single message string. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
