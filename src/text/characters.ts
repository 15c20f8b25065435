/**
 * @file characters.ts
 * @description Classification and case mapping of single code points.
 *
 * Everything here takes a numeric code point rather than a one-character
 * string, so it works the same whichever encoding the text was decoded from.
 */

import type { CodePoint } from '../core/types.js';

/** Code points the parsers look for by value */
export enum CharCode {
  nullCharacter = 0x00,
  tab = 0x09,
  lineFeed = 0x0a,
  verticalTab = 0x0b,
  formFeed = 0x0c,
  carriageReturn = 0x0d,
  space = 0x20,
  plus = 0x2b,
  minus = 0x2d,
  dot = 0x2e,
  _0 = 0x30,
  _9 = 0x39,
  A = 0x41,
  E = 0x45,
  F = 0x46,
  Z = 0x5a,
  a = 0x61,
  e = 0x65,
  f = 0x66,
  i = 0x69,
  n = 0x6e,
  z = 0x7a,
  maxAscii = 0x7f,
  maxCodePoint = 0x10ffff,
}

const LETTER = /^\p{L}$/u;
const UPPER = /^\p{Lu}$/u;
const LOWER = /^\p{Ll}$/u;

/** String form of a code point, or null for values no string can hold */
function asString(c: CodePoint): string | null {
  if (c < 0 || c > CharCode.maxCodePoint || !Number.isInteger(c)) return null;
  return String.fromCodePoint(c);
}

/** Accept a case mapping only when it stays a single code point */
function singleCodePoint(mapped: string, fallback: CodePoint): CodePoint {
  const cp = mapped.codePointAt(0);
  if (cp === undefined) return fallback;
  return mapped.length === (cp > 0xffff ? 2 : 1) ? cp : fallback;
}

/** True for ASCII '0' to '9' only. */
export function isDigit(c: CodePoint): boolean {
  return c >= CharCode._0 && c <= CharCode._9;
}

/**
 * True for ASCII space and TAB through CR, plus the unicode space separators
 * (the no-break spaces excluded).
 */
export function isWhitespace(c: CodePoint): boolean {
  if (c <= CharCode.maxAscii)
    return c === CharCode.space || (c >= CharCode.tab && c <= CharCode.carriageReturn);
  return c === 0x1680
    || (c >= 0x2000 && c <= 0x2006)
    || (c >= 0x2008 && c <= 0x200a)
    || c === 0x2028 || c === 0x2029
    || c === 0x205f || c === 0x3000;
}

export function isLetter(c: CodePoint): boolean {
  if (c <= CharCode.maxAscii)
    return (c >= CharCode.A && c <= CharCode.Z) || (c >= CharCode.a && c <= CharCode.z);
  const s = asString(c);
  return s !== null && LETTER.test(s);
}

export function isLetterOrDigit(c: CodePoint): boolean {
  return isDigit(c) || isLetter(c);
}

export function isUpperCase(c: CodePoint): boolean {
  if (c <= CharCode.maxAscii) return c >= CharCode.A && c <= CharCode.Z;
  const s = asString(c);
  return s !== null && UPPER.test(s);
}

export function isLowerCase(c: CodePoint): boolean {
  if (c <= CharCode.maxAscii) return c >= CharCode.a && c <= CharCode.z;
  const s = asString(c);
  return s !== null && LOWER.test(s);
}

/** Upper-case mapping; code points without a one-to-one mapping map to themselves. */
export function toUpperCase(c: CodePoint): CodePoint {
  if (c <= CharCode.maxAscii)
    return (c >= CharCode.a && c <= CharCode.z) ? c - 0x20 : c;
  const s = asString(c);
  return s === null ? c : singleCodePoint(s.toUpperCase(), c);
}

/** Lower-case mapping; code points without a one-to-one mapping map to themselves. */
export function toLowerCase(c: CodePoint): CodePoint {
  if (c <= CharCode.maxAscii)
    return (c >= CharCode.A && c <= CharCode.Z) ? c + 0x20 : c;
  const s = asString(c);
  return s === null ? c : singleCodePoint(s.toLowerCase(), c);
}

/** Returns 0 to 15 for '0' to 'F' (either case), or -1 for anything else. */
export function getHexDigitValue(c: CodePoint): number {
  if (isDigit(c)) return c - CharCode._0;
  if (c >= CharCode.a && c <= CharCode.f) return c - CharCode.a + 10;
  if (c >= CharCode.A && c <= CharCode.F) return c - CharCode.A + 10;
  return -1;
}
