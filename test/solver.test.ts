/**
 * Tests for GF(2) rank, independence and solution enumeration.
 */

import { describe, test, expect } from "vitest";
import * as fc from "fast-check";
import {
  ConstraintSampler,
  InvalidParameterError,
  SeededRandom,
  SolverStrategyValues,
  dot,
  isLinearlyIndependent,
  makeInjective,
  makePeriodic,
  assertStrategy,
  rank,
  solve,
  spaceSize,
  verifyCandidates,
} from "../ts/index.js";
import type { SolverStrategy } from "../ts/index.js";
import { batchOf, fullSpace, widthAndVectors } from "./helpers.js";

const STRATEGIES: SolverStrategy[] = [
  SolverStrategyValues.Elimination,
  SolverStrategyValues.BruteForce,
];

describe("rank", () => {
  test("counts independent directions", () => {
    expect(rank(batchOf(), 3)).toBe(0);
    expect(rank(batchOf(0), 3)).toBe(0);
    expect(rank(batchOf(1, 2, 3), 2)).toBe(2);
    expect(rank(batchOf(0b001, 0b010, 0b100), 3)).toBe(3);
    expect(rank(batchOf(0b110, 0b011, 0b101), 3)).toBe(2);
  });

  test("rejects an invalid width before allocating", () => {
    expect(() => rank(batchOf(1), -1)).toThrow("Invalid width (-1): must be at least 1");
    expect(() => rank(batchOf(1), 2.5)).toThrow("Invalid width (2.5): must be an integer");
  });
});

describe.each(STRATEGIES)("isLinearlyIndependent (%s)", (strategy) => {
  test("independent batches", () => {
    expect(isLinearlyIndependent(batchOf(), 3, strategy)).toBe(true);
    expect(isLinearlyIndependent(batchOf(0b01, 0b10), 2, strategy)).toBe(true);
    expect(isLinearlyIndependent(batchOf(0b011, 0b101), 3, strategy)).toBe(true);
  });

  test("a zero vector is dependent", () => {
    expect(isLinearlyIndependent(batchOf(0), 3, strategy)).toBe(false);
    expect(isLinearlyIndependent(batchOf(0b101, 0), 3, strategy)).toBe(false);
  });

  test("repeats and XOR combinations are dependent", () => {
    expect(isLinearlyIndependent(batchOf(5, 5), 3, strategy)).toBe(false);
    expect(isLinearlyIndependent(batchOf(0b110, 0b011, 0b101), 3, strategy)).toBe(false);
    expect(isLinearlyIndependent(batchOf(1, 2, 3), 2, strategy)).toBe(false);
  });

  test("is idempotent", () => {
    const batch = batchOf(0b1100, 0b0110, 0b0011);
    const first = isLinearlyIndependent(batch, 4, strategy);
    expect(isLinearlyIndependent(batch, 4, strategy)).toBe(first);
    expect(first).toBe(true);
  });
});

describe.each(STRATEGIES)("solve (%s)", (strategy) => {
  test("empty batch gives the whole space", () => {
    expect(solve(batchOf(), 2, strategy)).toEqual([0, 1, 2, 3]);
  });

  test("two constraints in three bits leave {000, 111}", () => {
    expect(solve(batchOf(0b011, 0b101), 3, strategy)).toEqual([0, 7]);
  });

  test("one constraint in three bits leaves a subgroup of four", () => {
    expect(solve(batchOf(0b110), 3, strategy)).toEqual([0, 1, 6, 7]);
  });

  test("dependent constraints do not shrink the set further", () => {
    expect(solve(batchOf(0b011, 0b011), 3, strategy)).toEqual([0, 3, 4, 7]);
  });

  test("full-rank batch leaves only 0", () => {
    expect(solve(batchOf(0b001, 0b010, 0b100), 3, strategy)).toEqual([0]);
  });

  test("rejects vectors outside the width", () => {
    expect(() => solve(batchOf(8), 3, strategy)).toThrow(
      "Invalid batch[0].y (8): must be an integer in [0, 8)",
    );
  });
});

describe("Strategy validation", () => {
  // An untyped caller can still hand over any string.
  const unknownStrategy: SolverStrategy = JSON.parse('"gauss"');

  test("accepts every known strategy", () => {
    for (const strategy of STRATEGIES) {
      expect(() => assertStrategy(strategy)).not.toThrow();
    }
  });

  test("rejects an unknown strategy instead of falling back", () => {
    expect(() => assertStrategy(unknownStrategy)).toThrow(
      "Invalid strategy (gauss): unknown solver strategy",
    );
    expect(() => solve(batchOf(1), 2, unknownStrategy)).toThrow(InvalidParameterError);
    expect(() => isLinearlyIndependent(batchOf(1), 2, unknownStrategy)).toThrow(
      InvalidParameterError,
    );
  });
});

describe("Strategy agreement", () => {
  test("elimination and brute force agree on every batch", () => {
    fc.assert(
      fc.property(widthAndVectors, ([width, ys]) => {
        const batch = batchOf(...ys);
        const elim = solve(batch, width, SolverStrategyValues.Elimination);
        const brute = solve(batch, width, SolverStrategyValues.BruteForce);
        return (
          JSON.stringify(elim) === JSON.stringify(brute) &&
          isLinearlyIndependent(batch, width, SolverStrategyValues.Elimination) ===
            isLinearlyIndependent(batch, width, SolverStrategyValues.BruteForce)
        );
      }),
      { numRuns: 200 },
    );
  });

  test("solution set contains 0, is orthogonal, and has 2^(n - rank) elements", () => {
    fc.assert(
      fc.property(widthAndVectors, ([width, ys]) => {
        const batch = batchOf(...ys);
        const set = solve(batch, width);
        return (
          set[0] === 0 &&
          set.length === spaceSize(width - rank(batch, width)) &&
          set.every((c) => ys.every((y) => dot(y, c) === 0))
        );
      }),
      { numRuns: 200 },
    );
  });
});

describe("Sampled batches", () => {
  test("an independent periodic batch solves to exactly {0, s}", () => {
    const secret = 0b100110;
    const rng = new SeededRandom(50);
    const sampler = new ConstraintSampler(makePeriodic(6, 6, secret, rng), rng);

    let batch = sampler.batch();
    for (let i = 0; i < 200 && !isLinearlyIndependent(batch, 6); i++) {
      batch = sampler.batch();
    }

    expect(isLinearlyIndependent(batch, 6)).toBe(true);
    for (const strategy of STRATEGIES) {
      expect(solve(batch, 6, strategy)).toEqual([0, secret]);
    }
  });

  test("the true secret satisfies every sampled constraint", () => {
    const secret = 0b0111;
    const rng = new SeededRandom(51);
    const sampler = new ConstraintSampler(makePeriodic(4, 4, secret, rng), rng);
    for (let i = 0; i < 20; i++) {
      expect(solve(sampler.batch(), 4)).toContain(secret);
    }
  });
});

describe("verifyCandidates", () => {
  test("only the true secret matches f(0)", () => {
    const oracle = makePeriodic(3, 3, 0b101, new SeededRandom(60));
    const checks = verifyCandidates(oracle, fullSpace(3));
    expect(checks).toHaveLength(7);
    expect(checks.filter((c) => c.matches)).toEqual([{ candidate: 0b101, matches: true }]);
  });

  test("no candidate matches for an injective oracle", () => {
    const oracle = makeInjective(3, 3, new SeededRandom(61));
    expect(verifyCandidates(oracle, [0, 3, 5, 6]).some((c) => c.matches)).toBe(false);
  });

  test("skips 0", () => {
    const oracle = makeInjective(3, 3, new SeededRandom(62));
    expect(verifyCandidates(oracle, [0])).toEqual([]);
  });

  test("rejects candidates outside the domain", () => {
    const oracle = makeInjective(3, 3, new SeededRandom(63));
    expect(() => verifyCandidates(oracle, [0, 9])).toThrow(InvalidParameterError);
  });
});
