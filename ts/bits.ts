/**
 * Fixed-width bit-string helpers.
 *
 * A bit string of width n is an unsigned integer in [0, 2^n). Everything
 * here stays in unsigned 32-bit arithmetic, so widths are capped well below
 * 32 bits.
 */

import { InvalidParameterError } from "./errors.js";

/** Largest supported width. A table of 2^24 uint32 entries is 64 MiB. */
export const MAX_WIDTH = 24;

/** Number of bit strings of the given width. */
export function spaceSize(width: number): number {
  return 2 ** width;
}

/** True if `value` is an integer in [0, 2^width). */
export function isBitString(value: number, width: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < spaceSize(width);
}

/**
 * Validate a width parameter.
 *
 * @param min Smallest accepted width (2 for oracle inputs).
 */
export function assertWidth(parameter: string, width: number, min: number = 1): void {
  if (!Number.isInteger(width)) {
    throw new InvalidParameterError(parameter, width, "must be an integer");
  }
  if (width < min) {
    throw new InvalidParameterError(parameter, width, `must be at least ${min}`);
  }
  if (width > MAX_WIDTH) {
    throw new InvalidParameterError(parameter, width, `must be at most ${MAX_WIDTH}`);
  }
}

/** Validate that `value` is a bit string of the given width. */
export function assertBitString(parameter: string, value: number, width: number): void {
  if (!isBitString(value, width)) {
    throw new InvalidParameterError(
      parameter,
      value,
      `must be an integer in [0, ${spaceSize(width)})`,
    );
  }
}

/** Number of set bits. */
export function popcount(x: number): number {
  let v = x >>> 0;
  v = v - ((v >>> 1) & 0x55555555);
  v = (v & 0x33333333) + ((v >>> 2) & 0x33333333);
  v = (v + (v >>> 4)) & 0x0f0f0f0f;
  return Math.imul(v, 0x01010101) >>> 24;
}

/** Parity of the set bits: 1 if odd, 0 if even. */
export function parity(x: number): 0 | 1 {
  return (popcount(x) & 1) === 1 ? 1 : 0;
}

/** Inner product over GF(2): parity of the bitwise AND. */
export function dot(a: number, b: number): 0 | 1 {
  return parity(a & b);
}

/** XOR (addition over GF(2)^n). */
export function xor(a: number, b: number): number {
  return (a ^ b) >>> 0;
}

/** Index of the lowest set bit; -1 for zero. */
export function lowestSetBit(x: number): number {
  const v = x >>> 0;
  return v === 0 ? -1 : 31 - Math.clz32(v & -v);
}

/** Index of the highest set bit; -1 for zero. */
export function highestSetBit(x: number): number {
  const v = x >>> 0;
  return v === 0 ? -1 : 31 - Math.clz32(v);
}

/**
 * Format a bit string most-significant bit first, zero padded to `width`.
 *
 * @example
 * ```typescript
 * toBitString(5, 4); // "0101"
 * ```
 */
export function toBitString(value: number, width: number): string {
  assertBitString("value", value, width);
  return value.toString(2).padStart(width, "0");
}

/**
 * Parse a string of '0' and '1' characters, most-significant bit first.
 */
export function fromBitString(bits: string): number {
  if (!/^[01]+$/.test(bits)) {
    throw new InvalidParameterError("bits", bits, "must be a non-empty string of 0 and 1");
  }
  assertWidth("bits.length", bits.length);
  return parseInt(bits, 2);
}

/** Bits of `value` as 0/1 numbers, most-significant first. */
export function toBits(value: number, width: number): Array<0 | 1> {
  assertBitString("value", value, width);
  const bits: Array<0 | 1> = [];
  for (let i = width - 1; i >= 0; i--) {
    bits.push(((value >>> i) & 1) === 1 ? 1 : 0);
  }
  return bits;
}

/** Inverse of `toBits`. */
export function fromBits(bits: ReadonlyArray<0 | 1>): number {
  assertWidth("bits.length", bits.length);
  let value = 0;
  for (const bit of bits) {
    value = ((value << 1) | bit) >>> 0;
  }
  return value;
}
