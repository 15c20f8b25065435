/**
 * @file numeric.ts
 * @description Decimal text to double and to fixed-width integer conversion.
 *
 * Both parsers take a cursor and advance it in place, leaving it on the first
 * code point that is not part of the number. Neither ever throws on input:
 * text that is not a number yields 0, and integer overflow wraps.
 *
 * The floating-point conversion works in a single pass without allocating
 * big numbers. Digits before and after the decimal point are collected in two
 * separate lanes, each an exact integer accumulator that is periodically
 * folded into a double. Precision is capped at 17 significant digits (the 15
 * decimal digits a double guarantees plus two guard digits), so the last bit
 * of the result is not always correctly rounded.
 */

import {
  type int4,
  type int8,
  type uint4,
  type IntegerSize,
  TEXT_DEBUG,
  debugTrace,
  signExtend,
  wrapSigned,
} from '../core/types.js';
import { LowlevelError } from '../core/error.js';
import type { CharacterCursor } from './charpointer.js';
import { CharCode, isDigit, toLowerCase } from './characters.js';

/** Significant decimal digits kept at full precision */
export const MAX_SIGNIFICANT_DIGITS = 15 + 2;

/** Largest accumulator value that can take one more digit without leaving 32 bits */
export const MAX_ACCUMULATOR_VALUE: uint4 = Math.floor((0xffffffff - 9) / 10);

/** Exponent digits stop accumulating past this; the result is already 0 or Infinity */
export const EXPONENT_LIMIT = 100000;

/** Largest power of ten a double can hold */
const MAX_DECIMAL_EXPONENT = 308;

/**
 * Multiply `value` by 10 to the power `exponent`, building the power of ten by
 * repeated squaring. A zero value stays zero for any exponent.
 *
 * For exponents below -308 the divisor would overflow to Infinity, so the value
 * is first divided down in steps of 1e308 until the remaining power fits.
 */
export function mulexp10(value: number, exponent: int4): number {
  if (exponent === 0)
    return value;
  if (value === 0)
    return 0;

  const negative = exponent < 0;
  if (negative) {
    exponent = -exponent;
    while (exponent > MAX_DECIMAL_EXPONENT) {
      value /= 1e308;
      exponent -= MAX_DECIMAL_EXPONENT;
      if (value === 0)
        return 0;
    }
  }

  let result = 1.0;
  let power = 10.0;
  while (exponent !== 0) {
    if ((exponent & 1) !== 0) {
      result *= power;
      if (exponent === 1)
        break;
    }
    exponent >>= 1;
    power *= power;
  }

  return negative ? (value / result) : (value * result);
}

/**
 * One digit-accumulation lane (the integer part or the fractional part).
 */
class DigitLane {
  /** Digits already folded into a double */
  partial = 0;
  /** Exact integer of the digits collected since the last fold */
  accumulator = 0;
  /** Power of ten to shift `partial` by when the accumulator is folded in */
  digits = -1;
  /** Net exponent correction for digits dropped or placed after the point */
  adjustment = 0;

  push(digit: number): void {
    if (this.accumulator > MAX_ACCUMULATOR_VALUE) {
      this.partial = mulexp10(this.partial, this.digits) + this.accumulator;
      this.accumulator = 0;
      this.digits = 0;
    }
    this.accumulator = this.accumulator * 10 + digit;
    this.digits++;
  }

  value(): number {
    return mulexp10(this.partial, this.digits) + this.accumulator;
  }
}

function skipWhitespace(text: CharacterCursor): void {
  while (text.isWhitespace())
    text.advance();
}

/**
 * Case-insensitive match of `nan` or `inf` at the cursor. On a match the three
 * letters are consumed and NaN or Infinity returned.
 */
function matchSpecialValue(text: CharacterCursor): number | null {
  const c0 = toLowerCase(text.get());
  const c1 = toLowerCase(text.peek(1));
  const c2 = toLowerCase(text.peek(2));
  let result: number;
  if (c0 === CharCode.n && c1 === CharCode.a && c2 === CharCode.n)
    result = NaN;
  else if (c0 === CharCode.i && c1 === CharCode.n && c2 === CharCode.f)
    result = Infinity;
  else
    return null;
  text.advance();
  text.advance();
  text.advance();
  return result;
}

/**
 * Parse `e`/`E`, an optional sign and digits. The marker is consumed only if
 * at least one exponent digit follows it.
 */
function readExponent(text: CharacterCursor): number {
  let offset = 1;
  let c = text.peek(offset);
  if (c === CharCode.minus || c === CharCode.plus)
    c = text.peek(++offset);
  if (!isDigit(c))
    return 0;

  text.advance(); // marker
  const negative = text.get() === CharCode.minus;
  if (offset === 2)
    text.advance();

  let exponent = 0;
  while (text.isDigit()) {
    const digit = text.getAndAdvance() - CharCode._0;
    if (exponent < EXPONENT_LIMIT)
      exponent = exponent * 10 + digit;
  }
  return negative ? -exponent : exponent;
}

/**
 * Convert decimal text at the cursor to a double.
 *
 * Accepts leading whitespace, an optional sign, digits with an optional
 * decimal point, and an optional exponent; or `nan`/`inf` in any case.
 * Conversion stops at the first code point that cannot continue the number.
 * With no digits the result is 0 (negative zero after a `-`).
 */
export function parseFloatingPoint(text: CharacterCursor): number {
  skipWhitespace(text);

  let isNegative = false;
  const first = text.get();
  if (first === CharCode.minus || first === CharCode.plus) {
    isNegative = first === CharCode.minus;
    text.advance();
  }

  const special = matchSpecialValue(text);
  if (special !== null)
    return isNegative ? -special : special;

  const intPart = new DigitLane();
  const fracPart = new DigitLane();
  let lane = intPart;
  let digit = 0;
  let lastDigit = 0;
  let numSignificantDigits = 0;
  let digitsFound = false;

  for (;;) {
    if (text.isDigit()) {
      lastDigit = digit;
      digit = text.getAndAdvance() - CharCode._0;
      digitsFound = true;

      if (lane === fracPart)
        fracPart.adjustment++;

      if (numSignificantDigits === 0 && digit === 0)
        continue; // Leading zero

      if (++numSignificantDigits > MAX_SIGNIFICANT_DIGITS) {
        // Round the last kept digit half-to-even, then only track magnitude
        if (digit > 5 || (digit === 5 && (lastDigit & 1) !== 0))
          lane.accumulator++;

        if (lane === fracPart)
          fracPart.adjustment--;
        else
          intPart.adjustment++;

        while (text.isDigit()) {
          text.advance();
          if (lane === intPart)
            intPart.adjustment++;
        }
      } else {
        lane.push(digit);
      }
    } else if (lane === intPart && text.get() === CharCode.dot) {
      text.advance();
      lane = fracPart;

      if (numSignificantDigits > MAX_SIGNIFICANT_DIGITS) {
        while (text.isDigit())
          text.advance();
        break;
      }
    } else {
      break;
    }
  }

  const seenPoint = lane === fracPart;
  let exponent = 0;
  const marker = text.get();
  if (digitsFound && (marker === CharCode.e || marker === CharCode.E))
    exponent = readExponent(text);

  const intValue = intPart.value();
  let r = mulexp10(intValue, exponent + intPart.adjustment);
  if (seenPoint)
    r += mulexp10(fracPart.value(), exponent - fracPart.adjustment);

  if (TEXT_DEBUG)
    debugTrace(`parseFloatingPoint int=${intValue} adj=${intPart.adjustment} frac=${fracPart.value()} adj=${fracPart.adjustment} exp=${exponent} -> ${isNegative ? -r : r}`);

  return isNegative ? -r : r;
}

/**
 * Convert decimal digits at the cursor to a signed integer of the given byte
 * width (4 by default; 8 returns a bigint).
 *
 * Accepts leading whitespace and an optional `-` (not `+`). Overflow wraps
 * around in two's complement exactly as fixed-width arithmetic would, so
 * "2147483648" parses to -2147483648 at width 4. Callers that need range
 * checking must validate the token themselves.
 */
export function parseInteger(text: CharacterCursor): int4;
export function parseInteger(text: CharacterCursor, size: 1 | 2 | 4): int4;
export function parseInteger(text: CharacterCursor, size: 8): int8;
export function parseInteger(text: CharacterCursor, size: IntegerSize = 4): int4 | int8 {
  skipWhitespace(text);

  const isNeg = text.get() === CharCode.minus;
  if (isNeg)
    text.advance();

  if (size === 8) {
    let v = 0n;
    while (text.isDigit())
      v = signExtend(v * 10n + BigInt(text.getAndAdvance() - CharCode._0), 8);
    const result = signExtend(isNeg ? -v : v, 8);
    if (TEXT_DEBUG)
      debugTrace(`parseInteger size=8 -> ${result}`);
    return result;
  }
  if (size !== 1 && size !== 2 && size !== 4)
    throw new LowlevelError(`Unsupported integer size: ${String(size)}`);

  let v = 0;
  while (text.isDigit())
    v = (Math.imul(v, 10) + (text.getAndAdvance() - CharCode._0)) | 0;
  const result = wrapSigned(isNeg ? -v : v, size);
  if (TEXT_DEBUG)
    debugTrace(`parseInteger size=${size} -> ${result}`);
  return result;
}
