/**
 * @file types.ts
 * @description Fixed-width integer aliases, wraparound helpers and debug switches.
 *
 * Fixed-width integer types are mapped as follows:
 *   int1, int2, int4 → number (wrapped with 32-bit integer arithmetic)
 *   int8             → bigint (64-bit, wrapped with BigInt.asIntN)
 */

import { type Writer, ConsoleWriter } from '../util/writer.js';

// ---- Small integer types (fit in JS number) ----

/** Signed 8-bit integer */
export type int1 = number;
/** Signed 16-bit integer */
export type int2 = number;
/** Signed 32-bit integer */
export type int4 = number;
/** Unsigned 32-bit integer */
export type uint4 = number;

// ---- Big integer types ----

/** Signed 64-bit integer */
export type int8 = bigint;

/** A single unicode code point, independent of how it is stored */
export type CodePoint = number;

/** Byte width of a fixed-width signed integer target */
export type IntegerSize = 1 | 2 | 4 | 8;

// ---- Debug flags ----

/** Master debug switch for the numeric parsers */
export let TEXT_DEBUG = false;

let debugWriter: Writer = new ConsoleWriter();

/** Enable all debug flags */
export function enableDebug(): void {
  TEXT_DEBUG = true;
}

/** Disable all debug flags */
export function disableDebug(): void {
  TEXT_DEBUG = false;
}

/** Redirect debug traces (stdout by default) */
export function setDebugWriter(w: Writer): void {
  debugWriter = w;
}

/** Write one line of trace output to the current debug writer */
export function debugTrace(line: string): void {
  debugWriter.write(line);
  debugWriter.write('\n');
}

// ---- Wraparound helpers ----

/**
 * Wrap a 32-bit intermediate to the signed range of the given byte size.
 * Sizes 1 and 2 shift the value up against bit 31 and back down arithmetically.
 */
export function wrapSigned(val: number, byteSize: 1 | 2 | 4): number {
  const sa = 32 - byteSize * 8;
  return ((val << sa) >> sa);
}

/** Mask for n-byte value. Returns all 1s for the given byte width. */
export function uintbMask(byteSize: number): bigint {
  if (byteSize >= 8) return 0xFFFFFFFFFFFFFFFFn;
  return (1n << BigInt(byteSize * 8)) - 1n;
}

/** Sign-extend a value of the given byte size to a signed bigint */
export function signExtend(val: bigint, byteSize: number): bigint {
  const bits = byteSize * 8;
  const mask = uintbMask(byteSize);
  val = val & mask;
  const signBit = 1n << BigInt(bits - 1);
  if (val & signBit) {
    return val | (~mask);
  }
  return val;
}
