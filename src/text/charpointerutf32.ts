/**
 * @file charpointerutf32.ts
 * @description Cursor over UTF-32 text held in a Uint32Array (host byte order).
 */

import type { CodePoint } from '../core/types.js';
import { CharPointer, checkedUnits } from './charpointer.js';

/** UTF-32 cursor. Every unit is one code point, returned verbatim. */
export class CharPointerUtf32 extends CharPointer<Uint32Array> {
  constructor(data: Uint32Array, pos: number = 0) {
    super(data, pos);
  }

  /** Allocate terminated storage holding exactly `text` */
  static fromString(text: string): CharPointerUtf32 {
    const result = CharPointerUtf32.allocate([...text].length + 1);
    result.clone().writeString(text);
    return result;
  }

  /** Zeroed storage of the given number of 32-bit units (an empty string) */
  static allocate(units: number): CharPointerUtf32 {
    return new CharPointerUtf32(new Uint32Array(checkedUnits(units)));
  }

  protected decodeAt(i: number): CodePoint {
    return i < this.data.length ? this.data[i] : 0;
  }

  protected unitsAt(_i: number): number {
    return 1;
  }

  protected encodeAt(i: number, c: CodePoint): void {
    this.data[i] = c;
  }

  encodedLength(_c: CodePoint): number {
    return 4;
  }

  clone(): CharPointerUtf32 {
    return new CharPointerUtf32(this.data, this.pos);
  }
}
