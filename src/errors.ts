/**
 * Fatal startup error: the process cannot run without these settings.
 */
export class ConfigurationError extends Error {
  /** Names of the environment variables that were absent or empty */
  public readonly missing: readonly string[];

  constructor(message: string, missing: readonly string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.missing = missing;
  }
}
