/**
 * Typed error classes for simon-sim.
 */

// Structural view of SimulationResult, kept here to avoid a circular import.
export interface SimulationResultLike {
  readonly attempts: number;
  candidatesString(): string;
}

/**
 * Base error class for all simon-sim errors.
 */
export class SimonError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SimonError";
  }
}

/**
 * Thrown when a width, secret, count or input is outside its domain.
 *
 * Raised before any table is allocated; values are never clamped.
 */
export class InvalidParameterError extends SimonError {
  constructor(
    readonly parameter: string,
    readonly value: unknown,
    reason: string,
  ) {
    super(`Invalid ${parameter} (${String(value)}): ${reason}`);
    this.name = "InvalidParameterError";
  }
}

/**
 * Thrown by `SimulationResult.assertUniquelyDetermined()` when the sampled
 * constraints left more than one nonzero candidate.
 *
 * @example
 * ```typescript
 * try {
 *   result.assertUniquelyDetermined();
 * } catch (e) {
 *   if (e instanceof RankDeficientError) {
 *     console.error(`Candidates: ${e.result.candidatesString()}`);
 *   }
 * }
 * ```
 */
export class RankDeficientError extends SimonError {
  constructor(readonly result: SimulationResultLike) {
    super(
      `Constraints are rank deficient after ${result.attempts} attempt(s): ` +
        `candidates=${result.candidatesString()}`,
    );
    this.name = "RankDeficientError";
  }
}
