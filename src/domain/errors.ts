/**
 * Raised when a caller breaks the engine's input contract
 * (inverted window, unparseable date shortcut).
 */
export class ValidationError extends Error {
  override readonly name = 'ValidationError';
}

/** Raised for a missing, unreadable or malformed configuration. */
export class ConfigError extends Error {
  override readonly name = 'ConfigError';
}

/**
 * Raised when an event source cannot deliver its events.
 * `status` is set when the failure was an HTTP response.
 */
export class SourceError extends Error {
  override readonly name = 'SourceError';

  constructor(
    readonly source: string,
    message: string,
    readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(`${source}: ${message}`, options);
  }
}
