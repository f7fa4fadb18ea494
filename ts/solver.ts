/**
 * Linear algebra over GF(2) on constraint batches.
 *
 * Two interchangeable strategies:
 * - `elimination`: XOR-basis insertion and reduced row-echelon form,
 *   polynomial in the width. Use it beyond a dozen or so bits.
 * - `bruteForce`: subset and candidate enumeration, exponential in the
 *   width. Kept as the reference for small widths.
 */

import type {
  CandidateCheck,
  ConstraintBatch,
  SolutionSet,
  SolverStrategy,
} from "./types.js";
import { SolverStrategyValues } from "./types.js";
import { InvalidParameterError } from "./errors.js";
import type { Oracle } from "./oracle.js";
import {
  assertBitString,
  assertWidth,
  dot,
  highestSetBit,
  lowestSetBit,
  spaceSize,
} from "./bits.js";

const STRATEGIES: readonly string[] = Object.values(SolverStrategyValues);

/** Validate a solver strategy name. */
export function assertStrategy(strategy: SolverStrategy): void {
  if (!STRATEGIES.includes(strategy)) {
    throw new InvalidParameterError("strategy", strategy, "unknown solver strategy");
  }
}

function vectorsOf(batch: ConstraintBatch, width: number): number[] {
  assertWidth("width", width);
  return batch.map((c, i) => {
    assertBitString(`batch[${i}].y`, c.y, width);
    return c.y;
  });
}

/** Reduced row-echelon rows, each with the column of its leading one. */
interface EchelonRow {
  row: number;
  pivot: number;
}

function reducedEchelon(vectors: readonly number[]): EchelonRow[] {
  const rows: EchelonRow[] = [];
  for (const vector of vectors) {
    let v = vector;
    for (const { row, pivot } of rows) {
      if ((v >>> pivot) & 1) v ^= row;
    }
    if (v === 0) continue;

    const pivot = highestSetBit(v);
    for (const r of rows) {
      if ((r.row >>> pivot) & 1) r.row ^= v;
    }
    rows.push({ row: v, pivot });
  }
  return rows;
}

/** Every XOR combination of `basis`, ascending. */
function span(basis: readonly number[]): number[] {
  const out: number[] = [0];
  let acc = 0;
  // Gray code: each step flips exactly one basis vector in or out.
  for (let g = 1; g < 2 ** basis.length; g++) {
    acc ^= basis[lowestSetBit(g)];
    out.push(acc >>> 0);
  }
  return out.sort((a, b) => a - b);
}

/**
 * Rank of the batch's y-vectors over GF(2).
 */
export function rank(batch: ConstraintBatch, width: number): number {
  const vectors = vectorsOf(batch, width);
  const basis = new Uint32Array(width);
  let r = 0;
  for (const y of vectors) {
    let v = y;
    for (let bit = width - 1; bit >= 0 && v !== 0; bit--) {
      if (((v >>> bit) & 1) === 0) continue;
      if (basis[bit] === 0) {
        basis[bit] = v;
        r++;
        break;
      }
      v ^= basis[bit];
    }
  }
  return r;
}

function independentByEnumeration(vectors: readonly number[]): boolean {
  for (let i = 0; i < vectors.length; i++) {
    const target = vectors[i];
    const others = vectors.filter((_, j) => j !== i);
    // The empty selection XORs to zero.
    if (target === 0) return false;
    let acc = 0;
    for (let g = 1; g < 2 ** others.length; g++) {
      acc ^= others[lowestSetBit(g)];
      if (acc === target) return false;
    }
  }
  return true;
}

/**
 * Check whether the batch's y-vectors are linearly independent over GF(2).
 *
 * Exact and pure; an empty batch is independent.
 */
export function isLinearlyIndependent(
  batch: ConstraintBatch,
  width: number,
  strategy: SolverStrategy = SolverStrategyValues.Elimination,
): boolean {
  assertStrategy(strategy);
  if (strategy === SolverStrategyValues.BruteForce) {
    return independentByEnumeration(vectorsOf(batch, width));
  }
  return rank(batch, width) === batch.length;
}

function solveByEnumeration(vectors: readonly number[], width: number): SolutionSet {
  const out: SolutionSet = [];
  const size = spaceSize(width);
  for (let candidate = 0; candidate < size; candidate++) {
    if (vectors.every((y) => dot(y, candidate) === 0)) {
      out.push(candidate);
    }
  }
  return out;
}

function solveByElimination(vectors: readonly number[], width: number): SolutionSet {
  const rows = reducedEchelon(vectors);
  const pivots = new Set(rows.map((r) => r.pivot));
  const basis: number[] = [];
  for (let free = 0; free < width; free++) {
    if (pivots.has(free)) continue;
    let v = 1 << free;
    for (const { row, pivot } of rows) {
      if ((row >>> free) & 1) v |= 1 << pivot;
    }
    basis.push(v >>> 0);
  }
  return span(basis);
}

/**
 * All candidates c in [0, 2^width) with y·c = 0 for every constraint.
 *
 * The result is ascending and always starts with 0. An empty batch gives
 * the whole space; an independent batch of width - 1 gives two elements.
 */
export function solve(
  batch: ConstraintBatch,
  width: number,
  strategy: SolverStrategy = SolverStrategyValues.Elimination,
): SolutionSet {
  assertStrategy(strategy);
  const vectors = vectorsOf(batch, width);
  if (strategy === SolverStrategyValues.BruteForce) {
    return solveByEnumeration(vectors, width);
  }
  return solveByElimination(vectors, width);
}

/**
 * Query the oracle at every nonzero candidate and compare with f(0).
 *
 * Only 0 and the true secret share f(0), so at most one entry matches.
 */
export function verifyCandidates(
  oracle: Oracle,
  candidates: readonly number[],
): CandidateCheck[] {
  const reference = oracle.evaluate(0);
  return candidates
    .filter((c) => c !== 0)
    .map((candidate) => ({
      candidate,
      matches: oracle.evaluate(candidate) === reference,
    }));
}
