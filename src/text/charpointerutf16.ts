/**
 * @file charpointerutf16.ts
 * @description Cursor over UTF-16 text held in a Uint16Array (host byte order).
 */

import type { CodePoint } from '../core/types.js';
import { CharPointer, checkedUnits, codePointOf } from './charpointer.js';

function isHighSurrogate(u: number): boolean {
  return u >= 0xd800 && u <= 0xdbff;
}

function isLowSurrogate(u: number): boolean {
  return u >= 0xdc00 && u <= 0xdfff;
}

/**
 * UTF-16 cursor. A surrogate that is not part of a valid pair is returned as
 * itself and occupies one unit.
 */
export class CharPointerUtf16 extends CharPointer<Uint16Array> {
  constructor(data: Uint16Array, pos: number = 0) {
    super(data, pos);
  }

  /** Allocate terminated storage holding exactly `text` */
  static fromString(text: string): CharPointerUtf16 {
    let units = 1;
    for (const ch of text)
      units += CharPointerUtf16.getBytesRequiredFor(codePointOf(ch)) / 2;
    const result = CharPointerUtf16.allocate(units);
    result.clone().writeString(text);
    return result;
  }

  /** Zeroed storage of the given number of 16-bit units (an empty string) */
  static allocate(units: number): CharPointerUtf16 {
    return new CharPointerUtf16(new Uint16Array(checkedUnits(units)));
  }

  /** Encoded size of a code point: 2 bytes, or 4 for a surrogate pair */
  static getBytesRequiredFor(c: CodePoint): number {
    return c >= 0x10000 ? 4 : 2;
  }

  private hasPairAt(i: number): boolean {
    return i + 1 < this.data.length
      && isHighSurrogate(this.data[i])
      && isLowSurrogate(this.data[i + 1]);
  }

  protected decodeAt(i: number): CodePoint {
    if (i >= this.data.length) return 0;
    if (this.hasPairAt(i))
      return ((this.data[i] - 0xd800) << 10) + (this.data[i + 1] - 0xdc00) + 0x10000;
    return this.data[i];
  }

  protected unitsAt(i: number): number {
    return this.hasPairAt(i) ? 2 : 1;
  }

  protected encodeAt(i: number, c: CodePoint): void {
    if (c >= 0x10000) {
      const v = c - 0x10000;
      this.data[i] = 0xd800 + ((v >> 10) & 0x3ff);
      this.data[i + 1] = 0xdc00 + (v & 0x3ff);
    } else {
      this.data[i] = c;
    }
  }

  encodedLength(c: CodePoint): number {
    return CharPointerUtf16.getBytesRequiredFor(c);
  }

  clone(): CharPointerUtf16 {
    return new CharPointerUtf16(this.data, this.pos);
  }
}
