/**
 * @file charpointerutf8.ts
 * @description Cursor over UTF-8 text held in a Uint8Array.
 */

import type { CodePoint } from '../core/types.js';
import { CharPointer, checkedUnits, codePointOf } from './charpointer.js';

/**
 * UTF-8 cursor.
 *
 * Decoding is lenient: a lead byte whose continuation bytes are missing or
 * malformed, or a stray continuation byte, is returned as the raw byte value
 * and occupies one unit.
 */
export class CharPointerUtf8 extends CharPointer<Uint8Array> {
  constructor(data: Uint8Array, pos: number = 0) {
    super(data, pos);
  }

  /** Allocate terminated storage holding exactly `text` */
  static fromString(text: string): CharPointerUtf8 {
    let size = 1;
    for (const ch of text)
      size += CharPointerUtf8.getBytesRequiredFor(codePointOf(ch));
    const result = CharPointerUtf8.allocate(size);
    result.clone().writeString(text);
    return result;
  }

  /** Zeroed storage of the given number of bytes (an empty string) */
  static allocate(units: number): CharPointerUtf8 {
    return new CharPointerUtf8(new Uint8Array(checkedUnits(units)));
  }

  /** Encoded size of a code point: 1, 2, 3 or 4 bytes */
  static getBytesRequiredFor(c: CodePoint): number {
    if (c < 0x80) return 1;
    if (c < 0x800) return 2;
    if (c < 0x10000) return 3;
    return 4;
  }

  /**
   * Number of continuation bytes announced by a lead byte.
   * Returns 0 for ASCII, for stray continuation bytes and for 0xf8 to 0xff,
   * which lead no valid sequence.
   */
  private static extraBytesFor(lead: number): number {
    let bit = 0x40;
    let numExtra = 0;
    if ((lead & 0x80) === 0 || lead >= 0xf8) return 0;
    while ((lead & bit) !== 0 && bit > 0x8) {
      numExtra++;
      bit >>= 1;
    }
    return numExtra;
  }

  /** True if the sequence at `i` has all the continuation bytes its lead announces */
  private isComplete(i: number, numExtra: number): boolean {
    if (i + numExtra >= this.data.length) return false;
    for (let k = 1; k <= numExtra; k++) {
      if ((this.data[i + k] & 0xc0) !== 0x80) return false;
    }
    return true;
  }

  protected decodeAt(i: number): CodePoint {
    if (i >= this.data.length) return 0;
    const lead = this.data[i];
    const numExtra = CharPointerUtf8.extraBytesFor(lead);
    if (numExtra === 0 || !this.isComplete(i, numExtra)) return lead;
    let n = lead & (0x7f >> numExtra);
    for (let k = 1; k <= numExtra; k++)
      n = (n << 6) | (this.data[i + k] & 0x3f);
    return n === 0 ? lead : n; // Overlong encodings of 0 are not terminators
  }

  protected unitsAt(i: number): number {
    const numExtra = CharPointerUtf8.extraBytesFor(this.data[i]);
    return this.isComplete(i, numExtra) ? numExtra + 1 : 1;
  }

  protected encodeAt(i: number, c: CodePoint): void {
    const d = this.data;
    if (c < 0x80) {
      d[i] = c;
    } else if (c < 0x800) {
      d[i] = 0xc0 | ((c >> 6) & 0x1f);
      d[i + 1] = 0x80 | (c & 0x3f);
    } else if (c < 0x10000) {
      d[i] = 0xe0 | ((c >> 12) & 0xf);
      d[i + 1] = 0x80 | ((c >> 6) & 0x3f);
      d[i + 2] = 0x80 | (c & 0x3f);
    } else {
      d[i] = 0xf0 | ((c >> 18) & 7);
      d[i + 1] = 0x80 | ((c >> 12) & 0x3f);
      d[i + 2] = 0x80 | ((c >> 6) & 0x3f);
      d[i + 3] = 0x80 | (c & 0x3f);
    }
  }

  encodedLength(c: CodePoint): number {
    return CharPointerUtf8.getBytesRequiredFor(c);
  }

  clone(): CharPointerUtf8 {
    return new CharPointerUtf8(this.data, this.pos);
  }
}
