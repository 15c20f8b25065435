/**
 * @file characterfunctions.ts
 * @description Comparison, search and transcoding copy over character cursors.
 *
 * Every function works across encodings: the two sides of a comparison, or the
 * source and destination of a copy, may be backed by different storage formats.
 * Source cursors are taken by value (the functions walk clones), so callers'
 * cursors are left where they were. The destination of a copy is advanced.
 */

import type { CodePoint } from '../core/types.js';
import type { CharacterCursor, SelfCloning } from './charpointer.js';
import { toLowerCase } from './characters.js';

function sign(diff: number): number {
  return diff < 0 ? -1 : 1;
}

// ---------------------------------------------------------------------------
// Comparison
// ---------------------------------------------------------------------------

/** Ordinal comparison of two terminated strings: -1, 0 or 1 */
export function compare(text1: CharacterCursor, text2: CharacterCursor): number {
  const s1 = text1.clone();
  const s2 = text2.clone();
  for (;;) {
    const c1 = s1.getAndAdvance();
    const c2 = s2.getAndAdvance();
    const diff = c1 - c2;
    if (diff !== 0)
      return sign(diff);
    if (c1 === 0)
      break;
  }
  return 0;
}

/** Ordinal comparison of at most `maxChars` code points */
export function compareUpTo(text1: CharacterCursor, text2: CharacterCursor, maxChars: number): number {
  const s1 = text1.clone();
  const s2 = text2.clone();
  while (--maxChars >= 0) {
    const c1 = s1.getAndAdvance();
    const c2 = s2.getAndAdvance();
    const diff = c1 - c2;
    if (diff !== 0)
      return sign(diff);
    if (c1 === 0)
      break;
  }
  return 0;
}

/** Comparison of upper-case mappings; each side still moves one raw code point per step */
export function compareIgnoreCase(text1: CharacterCursor, text2: CharacterCursor): number {
  const s1 = text1.clone();
  const s2 = text2.clone();
  for (;;) {
    const c1 = s1.toUpperCase();
    const c2 = s2.toUpperCase();
    s1.advance();
    s2.advance();
    const diff = c1 - c2;
    if (diff !== 0)
      return sign(diff);
    if (c1 === 0)
      break;
  }
  return 0;
}

export function compareIgnoreCaseUpTo(text1: CharacterCursor, text2: CharacterCursor, maxChars: number): number {
  const s1 = text1.clone();
  const s2 = text2.clone();
  while (--maxChars >= 0) {
    const c1 = s1.toUpperCase();
    const c2 = s2.toUpperCase();
    s1.advance();
    s2.advance();
    const diff = c1 - c2;
    if (diff !== 0)
      return sign(diff);
    if (c1 === 0)
      break;
  }
  return 0;
}

// ---------------------------------------------------------------------------
// Search
// ---------------------------------------------------------------------------

/**
 * Code point offset of the first occurrence of `needle` in `haystack`, or -1.
 * An empty needle matches at offset 0.
 */
export function indexOf(haystack: CharacterCursor, needle: CharacterCursor): number {
  const h = haystack.clone();
  const needleLength = needle.length();
  let index = 0;
  for (;;) {
    if (h.compareUpTo(needle, needleLength) === 0)
      return index;
    if (h.getAndAdvance() === 0)
      return -1;
    ++index;
  }
}

/** Offset of the first `charToFind`, or -1. The terminator is never found. */
export function indexOfChar(text: CharacterCursor, charToFind: CodePoint): number {
  const t = text.clone();
  let i = 0;
  while (!t.isEmpty()) {
    if (t.getAndAdvance() === charToFind)
      return i;
    ++i;
  }
  return -1;
}

/** As indexOfChar, comparing lower-case mappings */
export function indexOfCharIgnoreCase(text: CharacterCursor, charToFind: CodePoint): number {
  const t = text.clone();
  const target = toLowerCase(charToFind);
  let i = 0;
  while (!t.isEmpty()) {
    if (t.toLowerCase() === target)
      return i;
    t.advance();
    ++i;
  }
  return -1;
}

/** A new cursor positioned past any leading whitespace; `text` is unchanged */
export function findEndOfWhitespace<T extends SelfCloning<T>>(text: T): T {
  const p = text.clone();
  while (p.isWhitespace())
    p.advance();
  return p;
}

// ---------------------------------------------------------------------------
// Transcoding copy
// ---------------------------------------------------------------------------

/** Copy code points up to and including the terminator; `dest` ends past the terminator */
export function copyAndAdvance(dest: CharacterCursor, src: CharacterCursor): void {
  const s = src.clone();
  let c: CodePoint;
  do {
    c = s.getAndAdvance();
    dest.write(c);
  } while (c !== 0);
}

/**
 * Copy while the encoded code points fit in `maxBytes` of destination storage.
 *
 * The copy stops before a code point that would overrun the budget; in that
 * case a terminator is stored (without moving `dest`) if it still fits.
 * @returns the number of bytes written, terminator included when written
 */
export function copyAndAdvanceUpToBytes(dest: CharacterCursor, src: CharacterCursor, maxBytes: number): number {
  const s = src.clone();
  let numBytesDone = 0;
  for (;;) {
    const c = s.getAndAdvance();
    const bytesNeeded = dest.encodedLength(c);
    if (bytesNeeded > maxBytes) {
      const nullBytes = dest.encodedLength(0);
      if (c !== 0 && nullBytes <= maxBytes) {
        dest.writeNull();
        numBytesDone += nullBytes;
      }
      break;
    }
    maxBytes -= bytesNeeded;
    numBytesDone += bytesNeeded;
    dest.write(c);
    if (c === 0)
      break;
  }
  return numBytesDone;
}

/** Copy at most `maxChars` code points; the terminator is written only if reached within the count */
export function copyAndAdvanceUpToNumChars(dest: CharacterCursor, src: CharacterCursor, maxChars: number): void {
  const s = src.clone();
  while (--maxChars >= 0) {
    const c = s.getAndAdvance();
    dest.write(c);
    if (c === 0)
      break;
  }
}
