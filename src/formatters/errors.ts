/**
 * Base error for header formatting.
 */
export class HeaderFormatError extends Error {
  constructor(
    message: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'HeaderFormatError';
  }
}
