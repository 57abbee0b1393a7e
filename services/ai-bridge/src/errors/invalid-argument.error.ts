/**
 * InvalidArgumentError
 * Raised by adapter constructors when called without a usable API key.
 * Thrown before any vendor client is created.
 */
export class InvalidArgumentError extends Error {
  constructor(
    message: string,
    public readonly argument: string,
  ) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}
