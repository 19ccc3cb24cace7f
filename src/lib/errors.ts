/**
 * Error taxonomy shared by the gateways, the aggregation helpers and the
 * route boundary. `ValidationError` lives in ./validation next to the
 * parsers that raise it.
 */

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * The backing store could not be reached, rejected the query or returned a
 * payload that does not describe forecast rows. The message is safe to log;
 * it is never sent to clients.
 */
export class DataSourceError extends Error {
  constructor(
    message: string,
    public readonly source: 'rest' | 'sql',
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DataSourceError';
  }
}

export class EmptyInputError extends Error {
  constructor(operation: string) {
    super(`${operation} requires at least one row`);
    this.name = 'EmptyInputError';
  }
}

export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}
