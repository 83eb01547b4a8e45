/**
 * Thrown when an engine or filter is constructed with invalid options.
 * Never raised by `mark` or `flush`.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
