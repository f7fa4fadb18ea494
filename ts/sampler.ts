/**
 * Protocol round sampling.
 *
 * Produces the classical outcome of one query-and-measure round: a
 * constraint vector y and the oracle value f(x) observed with it. For a
 * periodic oracle the terms with y·s = 1 cancel, so y is drawn only from
 * the orthogonal complement of s. For an injective oracle nothing cancels
 * and y is uniform over the whole space.
 */

import type { Constraint } from "./types.js";
import { OracleKindValues } from "./types.js";
import type { Oracle } from "./oracle.js";
import { InvalidParameterError } from "./errors.js";
import { assertBitString, assertWidth, dot, spaceSize } from "./bits.js";
import type { RandomSource } from "./rng.js";

/**
 * Enumerate {y in [0, 2^width) : y·secret = 0}, ascending.
 *
 * For nonzero secret this has exactly 2^(width-1) elements.
 */
export function orthogonalComplement(width: number, secret: number): Uint32Array {
  assertWidth("width", width);
  assertBitString("secret", secret, width);
  const size = spaceSize(width);
  const out = new Uint32Array(secret === 0 ? size : size / 2);
  let idx = 0;
  for (let y = 0; y < size; y++) {
    if (dot(y, secret) === 0) {
      out[idx++] = y;
    }
  }
  return out;
}

// One complement per periodic oracle, shared by every sampleRound call on it.
const complementCache = new WeakMap<Oracle, Uint32Array>();

function complementFor(oracle: Oracle): Uint32Array | null {
  if (oracle.kind !== OracleKindValues.Periodic) return null;
  let space = complementCache.get(oracle);
  if (space === undefined) {
    space = orthogonalComplement(oracle.width, oracle.secret);
    complementCache.set(oracle, space);
  }
  return space;
}

function draw(oracle: Oracle, space: Uint32Array | null, rng: RandomSource): Constraint {
  const size = spaceSize(oracle.width);
  const x = rng.nextInt(size);
  const y = space === null ? rng.nextInt(size) : space[rng.nextInt(space.length)];
  return { y, value: oracle.evaluate(x) };
}

function assertBatchSize(size: number): void {
  if (!Number.isInteger(size) || size < 0) {
    throw new InvalidParameterError("size", size, "must be a non-negative integer");
  }
}

/**
 * Sample one protocol round.
 *
 * @returns The measured constraint vector and f(x) for a uniform x.
 */
export function sampleRound(oracle: Oracle, rng: RandomSource): Constraint {
  return draw(oracle, complementFor(oracle), rng);
}

/**
 * Draws rounds from one oracle with its constraint space enumerated once.
 *
 * @example
 * ```typescript
 * const sampler = new ConstraintSampler(oracle, new SeededRandom(7));
 * const batch = sampler.batch(); // width - 1 rounds
 * ```
 */
export class ConstraintSampler {
  private readonly space: Uint32Array | null;

  constructor(
    readonly oracle: Oracle,
    private readonly rng: RandomSource,
  ) {
    this.space = complementFor(oracle);
  }

  /** Number of vectors y can be drawn from. */
  get spaceSize(): number {
    return this.space === null ? spaceSize(this.oracle.width) : this.space.length;
  }

  /** Sample one round. */
  sample(): Constraint {
    return draw(this.oracle, this.space, this.rng);
  }

  /** Sample `size` independent rounds (default width - 1). */
  batch(size: number = this.oracle.width - 1): Constraint[] {
    assertBatchSize(size);
    const out: Constraint[] = [];
    for (let i = 0; i < size; i++) {
      out.push(this.sample());
    }
    return out;
  }

  /** Endless sequence of fresh batches. */
  *batches(size: number = this.oracle.width - 1): Generator<Constraint[]> {
    assertBatchSize(size);
    while (true) {
      yield this.batch(size);
    }
  }
}

/**
 * Sample a batch of independent rounds.
 *
 * @param size Number of rounds (default width - 1).
 */
export function collectBatch(
  oracle: Oracle,
  rng: RandomSource,
  size: number = oracle.width - 1,
): Constraint[] {
  return new ConstraintSampler(oracle, rng).batch(size);
}

/**
 * Yield batches for repeated protocol runs against one oracle.
 *
 * The caller decides when to stop, for example on the first
 * linearly independent batch.
 */
export function collectBatches(
  oracle: Oracle,
  rng: RandomSource,
  size: number = oracle.width - 1,
): Generator<Constraint[]> {
  return new ConstraintSampler(oracle, rng).batches(size);
}
