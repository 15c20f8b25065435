/**
 * @file error.ts
 * @description Error raised when a caller breaks a cursor or buffer contract.
 *
 * Parsing and comparison never throw; this is reserved for misuse such as
 * writing past the end of a cursor's storage.
 */

export class LowlevelError extends Error {
  explain: string;
  constructor(message: string) {
    super(message);
    this.name = 'LowlevelError';
    this.explain = message;
  }
}
