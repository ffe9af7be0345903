/**
 * Raised for configuration that cannot work; fatal at construction or startup
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
