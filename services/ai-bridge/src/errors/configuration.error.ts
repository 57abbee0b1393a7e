/**
 * ConfigurationError
 * Raised when a provider cannot be resolved: unsupported name, or credentials
 * that are missing or rejected at client construction.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly details: {
      provider?: string;
      cause?: string;
    } = {},
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
