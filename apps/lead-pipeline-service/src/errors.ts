/**
 * A citation or snippet source could not be reached or returned an unusable payload.
 * Stages catch it and skip the affected unit.
 */
export class SourceUnavailableError extends Error {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(`${source}: ${message}`, options);
    this.name = "SourceUnavailableError";
    this.source = source;
  }
}

/**
 * Required credential or identity setting absent at startup
 */
export class ConfigurationMissingError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing required configuration: ${missing.join(", ")}`);
    this.name = "ConfigurationMissingError";
    this.missing = missing;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
