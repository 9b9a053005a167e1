// src/engine/errors.ts

/**
 * Invalid construction parameters (dimension mismatch, too few free cells,
 * malformed fixed layout). Thrown before any Board escapes to the caller.
 */
export class ConfigurationError extends Error {
  readonly code = "CONFIGURATION_ERROR" as const;

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function isConfigurationError(err: unknown): err is ConfigurationError {
  return err instanceof ConfigurationError;
}
