/**
 * Test helper functions for simon-sim tests.
 *
 * Provides batch builders, fast-check arbitraries, and table inspection
 * helpers shared across the suites.
 */

import * as fc from "fast-check";
import type { Constraint, Oracle } from "../ts/index.js";
import { spaceSize } from "../ts/index.js";

/**
 * Build a batch from bare y-vectors (value fixed at 0).
 */
export function batchOf(...ys: number[]): Constraint[] {
  return ys.map((y) => ({ y, value: 0 }));
}

/**
 * Group inputs by oracle output.
 */
export function preimages(oracle: Oracle): Map<number, number[]> {
  const groups = new Map<number, number[]>();
  oracle.values().forEach((value, x) => {
    const group = groups.get(value) ?? [];
    group.push(x);
    groups.set(value, group);
  });
  return groups;
}

/**
 * Sorted copy of the oracle table.
 */
export function sortedValues(oracle: Oracle): number[] {
  return Array.from(oracle.values()).sort((a, b) => a - b);
}

/**
 * [0, 1, ..., 2^width - 1].
 */
export function fullSpace(width: number): number[] {
  return Array.from({ length: spaceSize(width) }, (_, i) => i);
}

/** Arbitrary width with a fast table (2..8 bits). */
export const smallWidth = fc.integer({ min: 2, max: 8 });

/** Arbitrary (width, nonzero secret) pair. */
export const widthAndSecret = smallWidth.chain((width) =>
  fc.tuple(fc.constant(width), fc.integer({ min: 1, max: spaceSize(width) - 1 })),
);

/** Arbitrary (width, y-vectors) pair with up to width + 1 vectors. */
export const widthAndVectors = smallWidth.chain((width) =>
  fc.tuple(
    fc.constant(width),
    fc.array(fc.integer({ min: 0, max: spaceSize(width) - 1 }), { maxLength: width + 1 }),
  ),
);

/** Arbitrary uint32 seed. */
export const seed = fc.integer({ min: 0, max: 0xffffffff });
