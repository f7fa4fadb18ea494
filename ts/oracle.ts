/**
 * Oracle construction.
 *
 * An oracle is a lookup table over {0,1}^n built once from a shuffled pool
 * of m-bit outputs and never written again.
 */

import type { Config } from "./types.js";
import { OracleKindValues } from "./types.js";
import { InvalidParameterError } from "./errors.js";
import { assertBitString, assertWidth, spaceSize, xor } from "./bits.js";
import { shuffleInPlace, type RandomSource } from "./rng.js";

/** Smallest input width with a nonzero secret and a nonempty constraint batch. */
export const MIN_WIDTH = 2;

/**
 * Shared behaviour of both oracle variants.
 */
export abstract class TableOracle {
  protected constructor(
    /** Input width n. */
    readonly width: number,
    /** Output width m. */
    readonly codomainWidth: number,
    private readonly table: Uint32Array,
  ) {}

  /** Evaluate f(x). */
  evaluate(x: number): number {
    assertBitString("x", x, this.width);
    return this.table[x];
  }

  /** Number of inputs, 2^n. */
  get size(): number {
    return this.table.length;
  }

  /** Copy of the full table, indexed by input. */
  values(): Uint32Array {
    return this.table.slice();
  }
}

/** A one-to-one oracle. */
export class InjectiveOracle extends TableOracle {
  readonly kind = OracleKindValues.Injective;
  readonly secret = null;

  private constructor(width: number, codomainWidth: number, table: Uint32Array) {
    super(width, codomainWidth, table);
  }

  /**
   * Build a uniformly random injective oracle {0,1}^n -> {0,1}^m.
   *
   * The table is the first 2^n entries of a shuffled pool of all 2^m
   * outputs; for m = n it is a full random permutation.
   */
  static random(width: number, codomainWidth: number, rng: RandomSource): InjectiveOracle {
    assertWidths(width, codomainWidth);
    const pool = shuffledPool(codomainWidth, rng);
    return new InjectiveOracle(width, codomainWidth, pool.slice(0, spaceSize(width)));
  }
}

/** An oracle with f(x) = f(x ^ secret) and no other collisions. */
export class PeriodicOracle extends TableOracle {
  readonly kind = OracleKindValues.Periodic;

  private constructor(
    width: number,
    codomainWidth: number,
    readonly secret: number,
    table: Uint32Array,
  ) {
    super(width, codomainWidth, table);
  }

  /**
   * Build a random oracle hiding `secret` as an XOR period.
   *
   * Walks x upward; the first member of each orbit {x, x ^ s} takes pool[x]
   * and shares it with its partner. Orbit representatives are distinct
   * indices into a shuffled pool, so distinct orbits never collide.
   */
  static random(
    width: number,
    codomainWidth: number,
    secret: number,
    rng: RandomSource,
  ): PeriodicOracle {
    assertWidths(width, codomainWidth);
    assertSecret(secret, width);

    const pool = shuffledPool(codomainWidth, rng);
    const size = spaceSize(width);
    const table = new Uint32Array(size);
    const fixed = new Uint8Array(size);

    for (let x = 0; x < size; x++) {
      if (fixed[x] === 1) continue;
      const partner = xor(x, secret);
      table[x] = pool[x];
      table[partner] = pool[x];
      fixed[x] = 1;
      fixed[partner] = 1;
    }

    return new PeriodicOracle(width, codomainWidth, secret, table);
  }
}

/** Either oracle variant; narrow on `kind`. */
export type Oracle = InjectiveOracle | PeriodicOracle;

function assertWidths(width: number, codomainWidth: number): void {
  assertWidth("width", width, MIN_WIDTH);
  assertWidth("codomainWidth", codomainWidth, MIN_WIDTH);
  if (codomainWidth < width) {
    throw new InvalidParameterError(
      "codomainWidth",
      codomainWidth,
      `must be at least width (${width})`,
    );
  }
}

/** Validate a secret for the given width: nonzero and below 2^width. */
export function assertSecret(secret: number, width: number): void {
  assertBitString("secret", secret, width);
  if (secret === 0) {
    throw new InvalidParameterError("secret", secret, "must be nonzero");
  }
}

/** The values 0..2^m-1 in random order. */
function shuffledPool(codomainWidth: number, rng: RandomSource): Uint32Array {
  const pool = new Uint32Array(spaceSize(codomainWidth));
  for (let i = 0; i < pool.length; i++) {
    pool[i] = i;
  }
  return shuffleInPlace(pool, rng);
}

/**
 * Build a uniformly random injective oracle.
 *
 * @throws InvalidParameterError if n < 2, m < n or either exceeds MAX_WIDTH.
 */
export function makeInjective(
  width: number,
  codomainWidth: number,
  rng: RandomSource,
): InjectiveOracle {
  return InjectiveOracle.random(width, codomainWidth, rng);
}

/**
 * Build a random oracle hiding `secret` as an XOR period.
 *
 * @throws InvalidParameterError if the widths are invalid, s = 0 or s >= 2^n.
 */
export function makePeriodic(
  width: number,
  codomainWidth: number,
  secret: number,
  rng: RandomSource,
): PeriodicOracle {
  return PeriodicOracle.random(width, codomainWidth, secret, rng);
}

/**
 * Build the oracle a config describes: periodic when `secret` is set,
 * injective otherwise.
 */
export function makeOracle(
  config: Pick<Config, "width" | "codomainWidth" | "secret">,
  rng: RandomSource,
): Oracle {
  if (config.secret === null) {
    return makeInjective(config.width, config.codomainWidth, rng);
  }
  return makePeriodic(config.width, config.codomainWidth, config.secret, rng);
}

/** Uniform nonzero secret of the given width. */
export function randomSecret(width: number, rng: RandomSource): number {
  assertWidth("width", width, MIN_WIDTH);
  return 1 + rng.nextInt(spaceSize(width) - 1);
}
