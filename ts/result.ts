/**
 * Result wrapper class with helper methods.
 */

import type {
  CandidateCheck,
  ConstraintBatch,
  OracleKind,
  Outcome,
  SolutionSet,
  SolverStrategy,
} from "./types.js";
import { OutcomeValues } from "./types.js";
import { toBitString } from "./bits.js";
import { RankDeficientError } from "./errors.js";

// Display name mappings for string enum values
const OUTCOME_DISPLAY: Record<Outcome, string> = {
  periodic: "Periodic",
  injective: "Injective",
};

const ORACLE_KIND_DISPLAY: Record<OracleKind, string> = {
  periodic: "Periodic",
  injective: "Injective",
};

/** Raw data of one simulation run. */
export interface SimulationRecord {
  width: number;
  codomainWidth: number;
  seed: number;
  strategy: SolverStrategy;
  /** Variant the oracle was built as. */
  oracleKind: OracleKind;
  /** Secret the oracle hides; null for an injective oracle. */
  trueSecret: number | null;
  /** Last batch drawn. */
  batch: ConstraintBatch;
  /** Whether the last batch was linearly independent. */
  independent: boolean;
  /** Batches drawn, including the last. */
  attempts: number;
  /** Solution set of the last batch. */
  candidates: SolutionSet;
  /** Oracle check of every nonzero candidate. */
  verification: CandidateCheck[];
}

/**
 * Wrapper around SimulationRecord with helper methods.
 *
 * @example
 * ```typescript
 * const result = SimonSimulation.forWidth(6).secret(0b101101).seed(3).run();
 *
 * if (result.isPeriodic()) {
 *   console.log(`s = ${result.recoveredSecretString()}`);
 * }
 *
 * // Or require a full-rank batch
 * result.assertUniquelyDetermined(); // throws RankDeficientError otherwise
 * ```
 */
export class SimulationResult {
  constructor(private readonly raw: SimulationRecord) {}

  /** Input width n. */
  get width(): number {
    return this.raw.width;
  }

  /** Output width m. */
  get codomainWidth(): number {
    return this.raw.codomainWidth;
  }

  /** Seed the run was started from. */
  get seed(): number {
    return this.raw.seed;
  }

  get strategy(): SolverStrategy {
    return this.raw.strategy;
  }

  get oracleKind(): OracleKind {
    return this.raw.oracleKind;
  }

  get trueSecret(): number | null {
    return this.raw.trueSecret;
  }

  get batch(): ConstraintBatch {
    return this.raw.batch;
  }

  get independent(): boolean {
    return this.raw.independent;
  }

  get attempts(): number {
    return this.raw.attempts;
  }

  /** Candidate secrets, ascending, 0 first. */
  get candidates(): SolutionSet {
    return this.raw.candidates;
  }

  get verification(): CandidateCheck[] {
    return this.raw.verification;
  }

  /** The nonzero candidate with f(c) = f(0), if any. */
  get recoveredSecret(): number | null {
    const match = this.raw.verification.find((check) => check.matches);
    return match === undefined ? null : match.candidate;
  }

  /** Conclusion drawn from the verification queries. */
  get outcome(): Outcome {
    return this.recoveredSecret === null ? OutcomeValues.Injective : OutcomeValues.Periodic;
  }

  // Predicate methods

  /** True if a secret was recovered. */
  isPeriodic(): boolean {
    return this.outcome === OutcomeValues.Periodic;
  }

  /** True if no nonzero candidate matched f(0). */
  isInjective(): boolean {
    return this.outcome === OutcomeValues.Injective;
  }

  /** True if the batch pinned the answer down to {0, c} without spurious candidates. */
  isUniquelyDetermined(): boolean {
    return this.independent && this.candidates.length === 2;
  }

  /** True if the conclusion matches how the oracle was built. */
  isCorrect(): boolean {
    return this.recoveredSecret === this.trueSecret;
  }

  // String formatters

  /** Get outcome as a string: 'Periodic' or 'Injective'. */
  outcomeString(): string {
    return OUTCOME_DISPLAY[this.outcome];
  }

  /** Get the oracle variant as a string. */
  oracleKindString(): string {
    return ORACLE_KIND_DISPLAY[this.oracleKind];
  }

  /** Recovered secret as a bit string, or "none". */
  recoveredSecretString(): string {
    const s = this.recoveredSecret;
    return s === null ? "none" : toBitString(s, this.width);
  }

  /** Candidates as bit strings, e.g. "{000, 101}". */
  candidatesString(): string {
    return `{${this.candidates.map((c) => toBitString(c, this.width)).join(", ")}}`;
  }

  /**
   * Assert that the batch was independent.
   *
   * Throws `RankDeficientError` otherwise. Returns `this` for chaining.
   */
  assertUniquelyDetermined(): this {
    if (!this.isUniquelyDetermined()) {
      throw new RankDeficientError(this);
    }
    return this;
  }

  /**
   * Get a human-readable summary string.
   *
   * @example
   * ```typescript
   * console.log(result.toString());
   * // → "Periodic: s=0110 (1 attempt, 2 candidates)"
   * // → "Injective: no candidate matched f(0) (2 attempts, 4 candidates)"
   * ```
   */
  toString(): string {
    const attempts = `${this.attempts} attempt${this.attempts === 1 ? "" : "s"}`;
    const counts = `(${attempts}, ${this.candidates.length} candidates)`;
    if (this.isPeriodic()) {
      return `${this.outcomeString()}: s=${this.recoveredSecretString()} ${counts}`;
    }
    return `${this.outcomeString()}: no candidate matched f(0) ${counts}`;
  }
}

