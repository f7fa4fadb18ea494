/**
 * Shared types and enum value objects.
 *
 * Enum-like options are plain string unions backed by `*Values` objects so
 * they can be compared at runtime without a TypeScript `enum`.
 */

/** Which promise the oracle satisfies. */
export const OracleKindValues = {
  /** f is one-to-one. */
  Injective: "injective",
  /** f(x) = f(x ^ s) for a nonzero secret s. */
  Periodic: "periodic",
} as const;

export type OracleKind = (typeof OracleKindValues)[keyof typeof OracleKindValues];

/** What a simulation run concluded about the oracle. */
export const OutcomeValues = {
  Periodic: "periodic",
  Injective: "injective",
} as const;

export type Outcome = (typeof OutcomeValues)[keyof typeof OutcomeValues];

/** How the GF(2) system is solved and its rank checked. */
export const SolverStrategyValues = {
  /** Row reduction over GF(2). Polynomial in the width. */
  Elimination: "elimination",
  /** Exhaustive search over subsets and candidates. Exponential, fine for small widths. */
  BruteForce: "bruteForce",
} as const;

export type SolverStrategy =
  (typeof SolverStrategyValues)[keyof typeof SolverStrategyValues];

/**
 * One sampled protocol round.
 *
 * Only `y` takes part in solving; `value` is kept so candidates can be
 * checked against the oracle afterwards.
 */
export interface Constraint {
  /** Constraint vector, read as the functional `c -> y·c mod 2`. */
  readonly y: number;
  /** Oracle output f(x) for the x drawn alongside `y`. */
  readonly value: number;
}

/** Ordered constraints from independent rounds, normally `width - 1` of them. */
export type ConstraintBatch = readonly Constraint[];

/** Every candidate secret orthogonal to a batch, ascending, starting at 0. */
export type SolutionSet = number[];

/** Result of checking one candidate against the oracle. */
export interface CandidateCheck {
  candidate: number;
  /** True when f(candidate) equals f(0). */
  matches: boolean;
}

/** Simulation configuration. */
export interface Config {
  /** Input width n in bits. */
  width: number;
  /** Output width m in bits (m >= n). */
  codomainWidth: number;
  /** Hidden period; null selects an injective oracle. */
  secret: number | null;
  /** Seed for the run's random stream. */
  seed: number;
  /** Solver used for rank checks and candidate enumeration. */
  strategy: SolverStrategy;
  /** Batches drawn while looking for an independent one. */
  maxAttempts: number;
}
