/**
 * @file numeric.test.ts
 * @description Unit tests for parseFloatingPoint, parseInteger and mulexp10.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { CharPointerUtf8 } from '../../src/text/charpointerutf8.js';
import { CharPointerUtf16 } from '../../src/text/charpointerutf16.js';
import { CharPointerUtf32 } from '../../src/text/charpointerutf32.js';
import { mulexp10, parseFloatingPoint, parseInteger } from '../../src/text/numeric.js';
import { enableDebug, disableDebug, setDebugWriter } from '../../src/core/types.js';
import { ConsoleWriter, StringWriter } from '../../src/util/writer.js';

function parseDouble(text: string): number {
  return parseFloatingPoint(CharPointerUtf8.fromString(text));
}

// ---------------------------------------------------------------------------
// mulexp10
// ---------------------------------------------------------------------------

describe('mulexp10', () => {
  it('is the identity for exponent 0', () => {
    expect(mulexp10(1.25, 0)).toBe(1.25);
  });

  it('keeps zero at any exponent', () => {
    expect(mulexp10(0, 500)).toBe(0);
    expect(mulexp10(0, -500)).toBe(0);
  });

  it('scales by exact powers of ten', () => {
    expect(mulexp10(3, 7)).toBe(30000000);
    expect(mulexp10(1, 22)).toBe(1e22);
    expect(mulexp10(5, -1)).toBe(0.5);
  });

  it('overflows to infinity and underflows to zero', () => {
    expect(mulexp10(1, 400)).toBe(Infinity);
    expect(mulexp10(1, -400)).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// parseFloatingPoint
// ---------------------------------------------------------------------------

describe('parseFloatingPoint', () => {
  describe('basic values', () => {
    it('parses zero and negative zero', () => {
      expect(Object.is(parseDouble('0'), 0)).toBe(true);
      expect(Object.is(parseDouble('-0'), -0)).toBe(true);
    });

    it('parses decimals and exponents', () => {
      expect(parseDouble('3.14159')).toBeCloseTo(3.14159, 12);
      expect(parseDouble('1e10')).toBe(1e10);
      expect(parseDouble('-2.5e-3')).toBe(-0.0025);
      expect(parseDouble('1.5E+2')).toBe(150);
      expect(parseDouble('1.23e5')).toBe(123000);
      expect(parseDouble('1e-5')).toBe(1e-5);
    });

    it('reproduces values with few significant digits exactly', () => {
      expect(parseDouble('0.001')).toBe(0.001);
      expect(parseDouble('0.125')).toBe(0.125);
      expect(parseDouble('12345.75')).toBe(12345.75);
      expect(parseDouble('1.2')).toBe(1.2);
      expect(parseDouble('.5')).toBe(0.5);
      expect(parseDouble('+42')).toBe(42);
    });

    it('parses every storage encoding the same way', () => {
      expect(parseFloatingPoint(CharPointerUtf16.fromString('-12.5'))).toBe(-12.5);
      expect(parseFloatingPoint(CharPointerUtf32.fromString('  6.25e1'))).toBe(62.5);
    });
  });

  describe('special tokens', () => {
    it('recognizes nan in any case', () => {
      expect(parseDouble('nan')).toBeNaN();
      expect(parseDouble('NaN')).toBeNaN();
    });

    it('recognizes inf in any case with its sign', () => {
      expect(parseDouble('inf')).toBe(Infinity);
      expect(parseDouble('INF')).toBe(Infinity);
      expect(parseDouble('-inf')).toBe(-Infinity);
    });

    it('consumes only the three letters of the token', () => {
      const c = CharPointerUtf8.fromString('nanny');
      expect(parseFloatingPoint(c)).toBeNaN();
      expect(c.getIndex()).toBe(3);
      expect(c.toString()).toBe('ny');
    });
  });

  describe('degenerate input', () => {
    it('returns zero for empty text', () => {
      expect(parseDouble('')).toBe(0);
    });

    it('returns zero without moving on non-numeric text', () => {
      const c = CharPointerUtf8.fromString('abc');
      expect(parseFloatingPoint(c)).toBe(0);
      expect(c.getIndex()).toBe(0);
    });

    it('returns signed zero for a bare sign', () => {
      expect(Object.is(parseDouble('-'), -0)).toBe(true);
      expect(Object.is(parseDouble('+'), 0)).toBe(true);
    });

    it('stops at the first code point that cannot continue the number', () => {
      const c = CharPointerUtf8.fromString('   42.5xyz');
      expect(parseFloatingPoint(c)).toBe(42.5);
      expect(c.toString()).toBe('xyz');

      const d = CharPointerUtf8.fromString('1.2.3');
      expect(parseFloatingPoint(d)).toBe(1.2);
      expect(d.toString()).toBe('.3');
    });

    it('leaves an exponent marker without digits unconsumed', () => {
      const c = CharPointerUtf8.fromString('7e');
      expect(parseFloatingPoint(c)).toBe(7);
      expect(c.toString()).toBe('e');

      const d = CharPointerUtf8.fromString('7e+x');
      expect(parseFloatingPoint(d)).toBe(7);
      expect(d.toString()).toBe('e+x');
    });

    it('ignores an exponent when no mantissa digits were found', () => {
      const c = CharPointerUtf8.fromString('e5');
      expect(parseFloatingPoint(c)).toBe(0);
      expect(c.getIndex()).toBe(0);
    });
  });

  describe('precision and magnitude', () => {
    it('does not count leading zeros as significant', () => {
      expect(parseDouble('000000000000000000001')).toBe(1);
      expect(parseDouble('0.0000000000000000000001')).toBe(1e-22);
    });

    it('flushes the accumulator before it leaves 32 bits', () => {
      expect(parseDouble('4294967295')).toBe(4294967295);
    });

    it('turns integer digits past the cap into magnitude', () => {
      expect(parseDouble('123456789012345678901')).toBe(1.2345678901234568e20);
    });

    it('drops fractional digits after a capped integer part', () => {
      const c = CharPointerUtf8.fromString('12345678901234567890.5');
      expect(parseFloatingPoint(c)).toBe(1.2345678901234568e19);
      expect(c.isEmpty()).toBe(true);
    });

    it('rounds the last kept digit half to even', () => {
      // Boundary 5 after an odd digit rounds up
      expect(parseDouble('0.123456789012345675')).toBe(0.12345678901234568);
      // Boundary 5 after an even digit is dropped
      expect(parseDouble('0.123456789012345665')).toBe(0.12345678901234566);
      // Boundary 6 always rounds up
      expect(parseDouble('0.123456789012345636')).toBe(0.12345678901234564);
    });

    it('saturates huge exponents', () => {
      expect(parseDouble('1e999999999')).toBe(Infinity);
      expect(parseDouble('1e-999999999')).toBe(0);
      expect(parseDouble('0e999999999')).toBe(0);
    });
  });

  describe('near the bottom of the range', () => {
    function relativeError(actual: number, expected: number): number {
      return Math.abs(actual / expected - 1);
    }

    it('keeps the fractional lane when its scale passes 10^-308', () => {
      expect(relativeError(parseDouble('1.23456e-305'), 1.23456e-305)).toBeLessThan(1e-14);
      expect(relativeError(parseDouble('9.99e-307'), 9.99e-307)).toBeLessThan(1e-14);
      expect(relativeError(parseDouble('2.2250738585072e-308'), 2.2250738585072e-308)).toBeLessThan(1e-14);
    });

    it('reaches subnormal values', () => {
      expect(parseDouble('5e-324')).toBe(Number.MIN_VALUE);
      expect(parseDouble('1e-320')).toBe(1e-320);
      expect(mulexp10(5, -324)).toBe(Number.MIN_VALUE);
    });

    it('still underflows to zero past the subnormal range', () => {
      expect(mulexp10(1, -400)).toBe(0);
      expect(parseDouble('1e-330')).toBe(0);
    });
  });

  describe('exactness', () => {
    // Deterministic digit strings from a fixed seed
    let seed = 42;
    function nextRandom(): number {
      seed = (Math.imul(seed, 1103515245) + 12345) & 0x7fffffff;
      return seed;
    }
    function randomDigits(count: number): string {
      let s = '';
      for (let i = 0; i < count; i++)
        s += String(nextRandom() % 10);
      return s;
    }

    it('is exact for integers of up to 15 digits', () => {
      for (let n = 0; n < 2000; n++) {
        const sign = nextRandom() % 3 === 0 ? '-' : '';
        const text = sign + randomDigits(1 + nextRandom() % 15);
        expect(parseDouble(text)).toBe(Number(text));
      }
    });

    it('is exact up to 2^53', () => {
      expect(parseDouble('9007199254740992')).toBe(2 ** 53);
      expect(parseDouble('-9007199254740991')).toBe(-(2 ** 53 - 1));
    });

    it('is exact for pure fractions of up to 15 digits and 22 decimal places', () => {
      for (let n = 0; n < 2000; n++) {
        const digits = randomDigits(1 + nextRandom() % 15);
        const zeros = '0'.repeat(nextRandom() % (23 - digits.length));
        const text = '0.' + zeros + digits;
        expect(parseDouble(text)).toBe(Number(text));
      }
    });

    it('can round twice when both lanes contribute', () => {
      // The integer and fractional lanes are each rounded and then summed
      expect(parseDouble('8.91472')).toBe(8.914719999999999);
      expect(parseDouble('38.63157')).toBe(38.631569999999996);
      expect(parseDouble('3.99591088294983e+11')).toBe(399591088294.98303);
      expect(parseDouble('4.28655505180359e-5')).toBe(0.000042865550518035906);
    });
  });
});

// ---------------------------------------------------------------------------
// parseInteger
// ---------------------------------------------------------------------------

describe('parseInteger', () => {
  it('parses signed decimal integers', () => {
    expect(parseInteger(CharPointerUtf8.fromString('12345'))).toBe(12345);
    expect(parseInteger(CharPointerUtf8.fromString('  -678'))).toBe(-678);
  });

  it('wraps on 32-bit overflow instead of saturating', () => {
    expect(parseInteger(CharPointerUtf8.fromString('2147483648'))).toBe(-2147483648);
    expect(parseInteger(CharPointerUtf8.fromString('4294967296'))).toBe(0);
    expect(parseInteger(CharPointerUtf8.fromString('-2147483648'))).toBe(-2147483648);
  });

  it('wraps to narrower widths', () => {
    expect(parseInteger(CharPointerUtf8.fromString('300'), 1)).toBe(44);
    expect(parseInteger(CharPointerUtf8.fromString('-129'), 1)).toBe(127);
    expect(parseInteger(CharPointerUtf8.fromString('40000'), 2)).toBe(-25536);
  });

  it('parses 64-bit values as bigint', () => {
    expect(parseInteger(CharPointerUtf16.fromString('-42'), 8)).toBe(-42n);
    expect(parseInteger(CharPointerUtf16.fromString('9223372036854775807'), 8)).toBe(9223372036854775807n);
    expect(parseInteger(CharPointerUtf16.fromString('9223372036854775808'), 8)).toBe(-9223372036854775808n);
  });

  it('stops on the first non-digit without consuming it', () => {
    const c = CharPointerUtf8.fromString('  -123abc');
    expect(parseInteger(c)).toBe(-123);
    expect(c.toString()).toBe('abc');
  });

  it('does not accept a leading plus', () => {
    const c = CharPointerUtf8.fromString('+5');
    expect(parseInteger(c)).toBe(0);
    expect(c.getIndex()).toBe(0);
  });

  it('returns zero without digits', () => {
    expect(parseInteger(CharPointerUtf8.fromString(''))).toBe(0);
    expect(parseInteger(CharPointerUtf8.fromString('-'))).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Debug tracing
// ---------------------------------------------------------------------------

describe('debug tracing', () => {
  afterEach(() => {
    disableDebug();
    setDebugWriter(new ConsoleWriter());
  });

  it('writes one line per parse when enabled', () => {
    const sw = new StringWriter();
    setDebugWriter(sw);
    enableDebug();
    parseInteger(CharPointerUtf8.fromString('42'));
    parseFloatingPoint(CharPointerUtf8.fromString('1.5'));
    expect(sw.toString()).toBe(
      'parseInteger size=4 -> 42\n' +
      'parseFloatingPoint int=1 adj=0 frac=5 adj=1 exp=0 -> 1.5\n',
    );
  });

  it('is silent when disabled', () => {
    const sw = new StringWriter();
    setDebugWriter(sw);
    parseFloatingPoint(CharPointerUtf8.fromString('2'));
    expect(sw.toString()).toBe('');
  });
});
