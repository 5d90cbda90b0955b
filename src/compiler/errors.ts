/**
 * Structural errors raised while tokenizing or parsing a condition.
 *
 * @module compiler/errors
 */

export class ParseError extends Error {
  constructor(
    message: string,
    public readonly pos: number,
    public readonly token = '',
  ) {
    super(`${message} at position ${pos}`);
    this.name = 'ParseError';
  }
}
