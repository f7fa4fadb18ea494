/**
 * Tests for fixed-width bit-string helpers.
 */

import { describe, test, expect } from "vitest";
import * as fc from "fast-check";
import {
  InvalidParameterError,
  MAX_WIDTH,
  assertWidth,
  dot,
  fromBitString,
  fromBits,
  highestSetBit,
  isBitString,
  lowestSetBit,
  parity,
  popcount,
  spaceSize,
  toBitString,
  toBits,
  xor,
} from "../ts/index.js";

describe("GF(2) arithmetic", () => {
  test("popcount counts set bits", () => {
    expect(popcount(0)).toBe(0);
    expect(popcount(0b1011)).toBe(3);
    expect(popcount(0xff)).toBe(8);
    expect(popcount(spaceSize(MAX_WIDTH) - 1)).toBe(24);
  });

  test("parity is popcount mod 2", () => {
    expect(parity(0)).toBe(0);
    expect(parity(0b11)).toBe(0);
    expect(parity(0b1011)).toBe(1);
  });

  test("dot is the parity of the bitwise AND", () => {
    expect(dot(0b110, 0b011)).toBe(1);
    expect(dot(0b101, 0b101)).toBe(0);
    expect(dot(0b101, 0b011)).toBe(1);
    expect(dot(0, 0b111)).toBe(0);
  });

  test("xor adds vectors", () => {
    expect(xor(0b1100, 0b1010)).toBe(0b0110);
    expect(xor(0b1010, 0b1010)).toBe(0);
  });

  test("dot is linear in its first argument", () => {
    const word = fc.integer({ min: 0, max: spaceSize(16) - 1 });
    fc.assert(
      fc.property(word, word, word, (a, b, c) => {
        return dot(xor(a, b), c) === (dot(a, c) ^ dot(b, c));
      }),
    );
  });

  test("lowest and highest set bit", () => {
    expect(lowestSetBit(0b1000)).toBe(3);
    expect(lowestSetBit(0b1010)).toBe(1);
    expect(lowestSetBit(0)).toBe(-1);
    expect(highestSetBit(0b1011)).toBe(3);
    expect(highestSetBit(1)).toBe(0);
    expect(highestSetBit(0)).toBe(-1);
  });
});

describe("Bit-string conversion", () => {
  test("toBitString pads to width, MSB first", () => {
    expect(toBitString(5, 4)).toBe("0101");
    expect(toBitString(0, 3)).toBe("000");
    expect(toBitString(7, 3)).toBe("111");
  });

  test("fromBitString parses MSB first", () => {
    expect(fromBitString("0101")).toBe(5);
    expect(fromBitString("1")).toBe(1);
  });

  test("toBits and fromBits", () => {
    expect(toBits(6, 3)).toEqual([1, 1, 0]);
    expect(toBits(1, 4)).toEqual([0, 0, 0, 1]);
    expect(fromBits([1, 0, 1])).toBe(5);
  });

  test("isBitString checks range and integrality", () => {
    expect(isBitString(15, 4)).toBe(true);
    expect(isBitString(16, 4)).toBe(false);
    expect(isBitString(-1, 4)).toBe(false);
    expect(isBitString(1.5, 4)).toBe(false);
  });

  test("rejects out-of-range values and malformed strings", () => {
    expect(() => toBitString(16, 4)).toThrow(InvalidParameterError);
    expect(() => fromBitString("012")).toThrow(InvalidParameterError);
    expect(() => fromBitString("")).toThrow(InvalidParameterError);
    expect(() => toBitString(16, 4)).toThrow("Invalid value (16): must be an integer in [0, 16)");
  });
});

describe("Width validation", () => {
  test("accepts widths in range", () => {
    expect(() => assertWidth("width", 2, 2)).not.toThrow();
    expect(() => assertWidth("width", MAX_WIDTH)).not.toThrow();
  });

  test("rejects non-integer, too small and too large widths", () => {
    expect(() => assertWidth("width", 1.5)).toThrow("Invalid width (1.5): must be an integer");
    expect(() => assertWidth("width", 1, 2)).toThrow("Invalid width (1): must be at least 2");
    expect(() => assertWidth("width", MAX_WIDTH + 1)).toThrow(
      `Invalid width (${MAX_WIDTH + 1}): must be at most ${MAX_WIDTH}`,
    );
  });

  test("errors carry the parameter and value", () => {
    try {
      assertWidth("codomainWidth", 0);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(InvalidParameterError);
      if (e instanceof InvalidParameterError) {
        expect(e.parameter).toBe("codomainWidth");
        expect(e.value).toBe(0);
        expect(e.name).toBe("InvalidParameterError");
      }
    }
  });
});
