/**
 * @file charpointer.ts
 * @description Character cursor contract and the base class shared by every encoding.
 *
 * A cursor is a position inside caller-owned, null-terminated storage. It never
 * copies or owns the storage; any number of cursors can view the same array.
 * Reads are total: at the terminator, or past the end of the array, the current
 * code point is 0 and advancing does nothing.
 */

import type { CodePoint, int4, int8 } from '../core/types.js';
import { LowlevelError } from '../core/error.js';
import { type Writer, StringWriter } from '../util/writer.js';
import * as chars from './characters.js';
import {
  compare,
  compareUpTo,
  compareIgnoreCase,
  compareIgnoreCaseUpTo,
  indexOf,
  indexOfChar,
  indexOfCharIgnoreCase,
} from './characterfunctions.js';
import { parseFloatingPoint, parseInteger } from './numeric.js';

/** Typed arrays a cursor can be backed by */
export type CodeUnitArray = Uint8Array | Uint16Array | Uint32Array;

/**
 * Capability set the parsers and lexical primitives rely on.
 * Every concrete encoding implements it identically.
 */
export interface CharacterCursor {
  /** Current code point without consuming it */
  get(): CodePoint;
  /** Current code point, then move past it */
  getAndAdvance(): CodePoint;
  advance(): void;
  /** Code point `offset` positions ahead, 0 once the terminator is reached */
  peek(offset: number): CodePoint;
  isEmpty(): boolean;
  isDigit(): boolean;
  isWhitespace(): boolean;
  toUpperCase(): CodePoint;
  toLowerCase(): CodePoint;
  /** Number of code points before the terminator */
  length(): number;
  compareUpTo(other: CharacterCursor, maxChars: number): number;
  /** Bytes this encoding needs to store `c` */
  encodedLength(c: CodePoint): number;
  /** Store `c` at the current position and move past it */
  write(c: CodePoint): void;
  /** Store a terminator at the current position without moving */
  writeNull(): void;
  clone(): CharacterCursor;
}

/** A cursor whose clone keeps its concrete type */
export interface SelfCloning<Self extends CharacterCursor> extends CharacterCursor {
  clone(): Self;
}

/** Validate a requested buffer size in code units */
export function checkedUnits(units: number): number {
  if (!Number.isInteger(units) || units < 0)
    throw new LowlevelError(`Bad buffer size: ${units}`);
  return units;
}

/** First code point of a one-character string produced by string iteration */
export function codePointOf(ch: string): CodePoint {
  return ch.codePointAt(0) ?? 0;
}

/**
 * Shared cursor behavior. Subclasses supply decoding and encoding for one
 * storage format; navigation, classification, comparison and parsing live here.
 */
export abstract class CharPointer<Units extends CodeUnitArray> implements CharacterCursor {
  protected readonly data: Units;
  protected pos: number;

  protected constructor(data: Units, pos: number) {
    this.data = data;
    this.pos = pos;
  }

  /** Decode the code point starting at unit index `i`; 0 past the end of storage */
  protected abstract decodeAt(i: number): CodePoint;
  /** Number of code units the code point starting at `i` occupies */
  protected abstract unitsAt(i: number): number;
  /** Encode `c` starting at unit index `i`; room has already been checked */
  protected abstract encodeAt(i: number, c: CodePoint): void;

  abstract encodedLength(c: CodePoint): number;
  abstract clone(): CharPointer<Units>;

  get(): CodePoint {
    return this.decodeAt(this.pos);
  }

  getAndAdvance(): CodePoint {
    const c = this.decodeAt(this.pos);
    if (c !== 0)
      this.pos += this.unitsAt(this.pos);
    return c;
  }

  advance(): void {
    this.getAndAdvance();
  }

  peek(offset: number): CodePoint {
    let i = this.pos;
    for (let n = 0; n < offset; n++) {
      if (this.decodeAt(i) === 0) return 0;
      i += this.unitsAt(i);
    }
    return this.decodeAt(i);
  }

  // ---- Classification of the current code point ----

  isEmpty(): boolean { return this.get() === 0; }
  isDigit(): boolean { return chars.isDigit(this.get()); }
  isWhitespace(): boolean { return chars.isWhitespace(this.get()); }
  isLetter(): boolean { return chars.isLetter(this.get()); }
  isLetterOrDigit(): boolean { return chars.isLetterOrDigit(this.get()); }
  isUpperCase(): boolean { return chars.isUpperCase(this.get()); }
  isLowerCase(): boolean { return chars.isLowerCase(this.get()); }
  toUpperCase(): CodePoint { return chars.toUpperCase(this.get()); }
  toLowerCase(): CodePoint { return chars.toLowerCase(this.get()); }

  // ---- Measurement ----

  length(): number {
    let n = 0;
    for (let i = this.pos; this.decodeAt(i) !== 0; i += this.unitsAt(i))
      n++;
    return n;
  }

  /** Bytes from this position through the terminator */
  sizeInBytes(): number {
    let i = this.pos;
    while (this.decodeAt(i) !== 0)
      i += this.unitsAt(i);
    return (i - this.pos + 1) * this.data.BYTES_PER_ELEMENT;
  }

  getIndex(): number { return this.pos; }
  getStorage(): Units { return this.data; }

  /** True if both cursors view the same storage at the same position */
  equals(other: CharPointer<CodeUnitArray>): boolean {
    return this.data === other.data && this.pos === other.pos;
  }

  // ---- Writing ----

  write(c: CodePoint): void {
    const units = this.encodedLength(c) / this.data.BYTES_PER_ELEMENT;
    this.checkRoom(units);
    this.encodeAt(this.pos, c);
    this.pos += units;
  }

  writeNull(): void {
    this.checkRoom(1);
    this.encodeAt(this.pos, 0);
  }

  /** Write every code point of `text` followed by a terminator (the cursor stops on the terminator) */
  writeString(text: string): void {
    for (const ch of text)
      this.write(codePointOf(ch));
    this.writeNull();
  }

  private checkRoom(units: number): void {
    if (this.pos + units > this.data.length)
      throw new LowlevelError(`Writing ${units} code unit(s) at index ${this.pos} overruns storage of ${this.data.length}`);
  }

  // ---- Comparison and search (the cursor itself never moves) ----

  compare(other: CharacterCursor): number { return compare(this, other); }
  compareUpTo(other: CharacterCursor, maxChars: number): number { return compareUpTo(this, other, maxChars); }
  compareIgnoreCase(other: CharacterCursor): number { return compareIgnoreCase(this, other); }
  compareIgnoreCaseUpTo(other: CharacterCursor, maxChars: number): number {
    return compareIgnoreCaseUpTo(this, other, maxChars);
  }
  indexOf(needle: CharacterCursor): number { return indexOf(this, needle); }
  indexOfChar(c: CodePoint): number { return indexOfChar(this, c); }
  indexOfCharIgnoreCase(c: CodePoint): number { return indexOfCharIgnoreCase(this, c); }

  // ---- Numeric values of the text at this position ----

  getDoubleValue(): number { return parseFloatingPoint(this.clone()); }
  getIntValue32(): int4 { return parseInteger(this.clone()); }
  getIntValue64(): int8 { return parseInteger(this.clone(), 8); }

  // ---- Conversion ----

  /** Iterate code points from this position up to the terminator */
  *[Symbol.iterator](): IterableIterator<CodePoint> {
    for (let i = this.pos; this.decodeAt(i) !== 0; i += this.unitsAt(i))
      yield this.decodeAt(i);
  }

  /** Stream the text to a writer; values no string can hold become U+FFFD */
  writeTo(w: Writer): void {
    for (const c of this)
      w.write(c <= chars.CharCode.maxCodePoint ? String.fromCodePoint(c) : '\ufffd');
  }

  toString(): string {
    const sw = new StringWriter();
    this.writeTo(sw);
    return sw.toString();
  }
}
