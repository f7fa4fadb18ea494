/**
 * simon-sim - Classical simulation of Simon's period-finding protocol
 *
 * Builds oracles that are either one-to-one or hide an XOR period s,
 * samples the constraints a measurement round would produce, and solves
 * the resulting system over GF(2).
 *
 * @example
 * ```typescript
 * import { SimonSimulation, estimateIndependenceProbability, OutcomeValues } from 'simon-sim';
 *
 * const result = SimonSimulation.forWidth(6).secret(0b011010).seed(1).run();
 *
 * switch (result.outcome) {
 *   case OutcomeValues.Periodic:
 *     console.log(`Secret: ${result.recoveredSecretString()}`);
 *     break;
 *   case OutcomeValues.Injective:
 *     console.log("f is one-to-one");
 *     break;
 * }
 *
 * const est = estimateIndependenceProbability(10, 1000, { seed: 7 });
 * console.log(est.toString());
 * ```
 *
 * @packageDocumentation
 */

// High-level API
export { SimonSimulation, defaultConfig, validateConfig } from "./simulation.js";
export { SimulationResult, type SimulationRecord } from "./result.js";

// Errors
export {
  SimonError,
  InvalidParameterError,
  RankDeficientError,
  type SimulationResultLike,
} from "./errors.js";

// Oracle factory
export {
  MIN_WIDTH,
  makeInjective,
  makePeriodic,
  makeOracle,
  randomSecret,
  assertSecret,
  type Oracle,
  type TableOracle,
  type InjectiveOracle,
  type PeriodicOracle,
} from "./oracle.js";

// Sampling
export {
  ConstraintSampler,
  sampleRound,
  collectBatch,
  collectBatches,
  orthogonalComplement,
} from "./sampler.js";

// GF(2) solving
export {
  rank,
  isLinearlyIndependent,
  solve,
  verifyCandidates,
  assertStrategy,
} from "./solver.js";

// Estimation
export {
  IndependenceEstimate,
  estimateIndependenceProbability,
  runIndependenceTrial,
  theoreticalIndependenceProbability,
  type EstimateOptions,
} from "./estimator.js";

// Randomness
export {
  SeededRandom,
  deriveSeed,
  randomSeed,
  fnv1a32,
  shuffleInPlace,
  type RandomSource,
} from "./rng.js";

// Bit strings
export {
  MAX_WIDTH,
  spaceSize,
  isBitString,
  assertWidth,
  assertBitString,
  popcount,
  parity,
  dot,
  xor,
  lowestSetBit,
  highestSetBit,
  toBitString,
  fromBitString,
  toBits,
  fromBits,
} from "./bits.js";

// Enum value objects (runtime constants)
export { OracleKindValues, OutcomeValues, SolverStrategyValues } from "./types.js";

// Types
export type {
  OracleKind,
  Outcome,
  SolverStrategy,
  Constraint,
  ConstraintBatch,
  SolutionSet,
  CandidateCheck,
  Config,
} from "./types.js";
