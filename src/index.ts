/**
 * @file index.ts
 * @description Public surface of the text cursor library.
 */

export {
  type int1,
  type int2,
  type int4,
  type int8,
  type uint4,
  type CodePoint,
  type IntegerSize,
  enableDebug,
  disableDebug,
  setDebugWriter,
} from './core/types.js';
export { LowlevelError } from './core/error.js';
export { type Writer, StringWriter, ConsoleWriter } from './util/writer.js';

export * from './text/characters.js';
export {
  type CodeUnitArray,
  type CharacterCursor,
  type SelfCloning,
  CharPointer,
} from './text/charpointer.js';
export { CharPointerUtf8 } from './text/charpointerutf8.js';
export { CharPointerUtf16 } from './text/charpointerutf16.js';
export { CharPointerUtf32 } from './text/charpointerutf32.js';
export { CharPointerAscii } from './text/charpointerascii.js';
export {
  MAX_SIGNIFICANT_DIGITS,
  mulexp10,
  parseFloatingPoint,
  parseInteger,
} from './text/numeric.js';
export * from './text/characterfunctions.js';
