/**
 * @file writer.ts
 * @description Writer interface for streamed string output.
 */

/**
 * Abstract sink for text output.
 * Implementations can write to strings, the console, or other destinations.
 */
export interface Writer {
  write(s: string): void;
}

/**
 * Writer that accumulates output into a string buffer.
 */
export class StringWriter implements Writer {
  private buf: string[] = [];

  write(s: string): void {
    this.buf.push(s);
  }

  toString(): string {
    return this.buf.join('');
  }
}

/**
 * Writer that writes to process stdout.
 */
export class ConsoleWriter implements Writer {
  write(s: string): void {
    process.stdout.write(s);
  }
}
