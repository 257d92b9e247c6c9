/**
 * Raised when the input cannot be read as a GPX document.
 * Nothing is written when this is thrown.
 */
export class GpxFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GpxFormatError';
  }
}

/**
 * Raised for option values the pipeline cannot run with
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public option: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
