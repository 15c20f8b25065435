/**
 * @file charpointerascii.ts
 * @description Cursor over single-byte text held in a Uint8Array.
 */

import type { CodePoint } from '../core/types.js';
import { CharCode } from './characters.js';
import { CharPointer, checkedUnits } from './charpointer.js';

const REPLACEMENT = 0x3f; // '?'

/**
 * Single-byte cursor. Each byte is one code point (bytes above 0x7f read back
 * as U+0080..U+00FF); a code point above 0xff is stored as '?'.
 */
export class CharPointerAscii extends CharPointer<Uint8Array> {
  constructor(data: Uint8Array, pos: number = 0) {
    super(data, pos);
  }

  /** Allocate terminated storage holding exactly `text` */
  static fromString(text: string): CharPointerAscii {
    const result = CharPointerAscii.allocate([...text].length + 1);
    result.clone().writeString(text);
    return result;
  }

  /** Zeroed storage of the given number of bytes (an empty string) */
  static allocate(units: number): CharPointerAscii {
    return new CharPointerAscii(new Uint8Array(checkedUnits(units)));
  }

  /** True if every code point up to the terminator is 7-bit */
  static isValidString(text: CharPointerAscii): boolean {
    for (const c of text) {
      if (c > CharCode.maxAscii) return false;
    }
    return true;
  }

  protected decodeAt(i: number): CodePoint {
    return i < this.data.length ? this.data[i] : 0;
  }

  protected unitsAt(_i: number): number {
    return 1;
  }

  protected encodeAt(i: number, c: CodePoint): void {
    this.data[i] = (c >= 0 && c <= 0xff) ? c : REPLACEMENT;
  }

  encodedLength(_c: CodePoint): number {
    return 1;
  }

  clone(): CharPointerAscii {
    return new CharPointerAscii(this.data, this.pos);
  }
}
