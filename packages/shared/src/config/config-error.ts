/**
 * ConfigError
 *
 * Raised by {@link loadConfig} when an environment value is missing or
 * malformed. `issues` holds one `PATH: message` line per problem.
 */
export class ConfigError extends Error {
  readonly kind = 'invalid-config';
  readonly issues: readonly string[];

  constructor(issues: string[], options?: ErrorOptions) {
    super(`Invalid configuration: ${issues.join('; ')}`, options);
    this.name = 'ConfigError';
    this.issues = Object.freeze([...issues]);
  }
}
