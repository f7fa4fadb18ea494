/**
 * Monte Carlo estimate of P(n-1 sampled constraints are independent).
 *
 * Each trial is a Bernoulli event. The number of protocol runs needed for
 * a first independent batch is then geometric with mean 1/p and variance
 * (1-p)/p².
 */

import type { SolverStrategy } from "./types.js";
import { SolverStrategyValues } from "./types.js";
import { InvalidParameterError } from "./errors.js";
import { MIN_WIDTH, makePeriodic, randomSecret } from "./oracle.js";
import { collectBatch } from "./sampler.js";
import { assertStrategy, isLinearlyIndependent } from "./solver.js";
import { SeededRandom, deriveSeed, randomSeed } from "./rng.js";
import { assertWidth } from "./bits.js";

/** Options for `estimateIndependenceProbability`. */
export interface EstimateOptions {
  /** Parent seed; trial k runs on `deriveSeed(seed, k)`. Random if omitted. */
  seed?: number;
  /** Oracle output width (default: width). */
  codomainWidth?: number;
  /** Solver used for the independence check. */
  strategy?: SolverStrategy;
  /**
   * Print progress to stderr, e.g.
   * `[trial 300/1000] P(independent)=29.0%`
   */
  showProgress?: boolean;
}

/**
 * Probability that width - 1 vectors drawn uniformly from a
 * (width - 1)-dimensional space over GF(2) are independent:
 * the product over k = 1..n-1 of (1 - 2^(k-n)).
 */
export function theoreticalIndependenceProbability(width: number): number {
  assertWidth("width", width, MIN_WIDTH);
  let p = 1;
  for (let k = 1; k < width; k++) {
    p *= 1 - 2 ** (k - width);
  }
  return p;
}

/**
 * Result of an independence estimate.
 *
 * @example
 * ```typescript
 * const est = estimateIndependenceProbability(10, 1000, { seed: 1 });
 * console.log(est.toString());
 * // → "P(independent)=28.7% over 1000 trials (theory 28.9%), E[runs]=3.48"
 * ```
 */
export class IndependenceEstimate {
  constructor(
    /** Input width n. */
    readonly width: number,
    /** Number of trials run. */
    readonly trials: number,
    /** Trials whose batch was independent. */
    readonly successes: number,
  ) {}

  /** Empirical success fraction. */
  get probability(): number {
    return this.successes / this.trials;
  }

  /** Expected runs to the first independent batch, 1/p. */
  get expectedTrialsToSuccess(): number {
    return this.successes === 0 ? Infinity : 1 / this.probability;
  }

  /** Variance of the runs to first success, (1-p)/p². */
  get variance(): number {
    const p = this.probability;
    return this.successes === 0 ? Infinity : (1 - p) / (p * p);
  }

  /** Exact probability for this width. */
  get theoreticalProbability(): number {
    return theoreticalIndependenceProbability(this.width);
  }

  /**
   * Wilson score interval for p.
   *
   * @param z Normal quantile (1.96 for 95%).
   */
  confidenceInterval(z: number = 1.96): [low: number, high: number] {
    const n = this.trials;
    const p = this.probability;
    const z2 = z * z;
    const denom = 1 + z2 / n;
    const center = (p + z2 / (2 * n)) / denom;
    const half = (z * Math.sqrt((p * (1 - p)) / n + z2 / (4 * n * n))) / denom;
    return [Math.max(0, center - half), Math.min(1, center + half)];
  }

  /** Format the probability as a percentage string (e.g., "28.7%"). */
  probabilityPercent(): string {
    return `${(this.probability * 100).toFixed(1)}%`;
  }

  toString(): string {
    const theory = `${(this.theoreticalProbability * 100).toFixed(1)}%`;
    return (
      `P(independent)=${this.probabilityPercent()} over ${this.trials} trials ` +
      `(theory ${theory}), E[runs]=${this.expectedTrialsToSuccess.toFixed(2)}`
    );
  }
}

/**
 * Run one trial: random nonzero secret, fresh periodic oracle, width - 1
 * constraints, independence check.
 */
export function runIndependenceTrial(
  width: number,
  seed: number,
  codomainWidth: number = width,
  strategy: SolverStrategy = SolverStrategyValues.Elimination,
): boolean {
  const rng = new SeededRandom(seed);
  const secret = randomSecret(width, rng);
  const oracle = makePeriodic(width, codomainWidth, secret, rng);
  const batch = collectBatch(oracle, rng);
  return isLinearlyIndependent(batch, width, strategy);
}

/**
 * Estimate the probability that width - 1 sampled constraints are
 * linearly independent.
 *
 * @param width Input width n (>= 2)
 * @param trials Number of independent protocol runs
 */
export function estimateIndependenceProbability(
  width: number,
  trials: number,
  options: EstimateOptions = {},
): IndependenceEstimate {
  assertWidth("width", width, MIN_WIDTH);
  if (!Number.isInteger(trials) || trials < 1) {
    throw new InvalidParameterError("trials", trials, "must be a positive integer");
  }
  const seed = options.seed ?? randomSeed();
  const codomainWidth = options.codomainWidth ?? width;
  const strategy = options.strategy ?? SolverStrategyValues.Elimination;
  assertStrategy(strategy);
  const progressEvery = Math.max(1, Math.floor(trials / 100));

  let successes = 0;
  for (let t = 0; t < trials; t++) {
    if (runIndependenceTrial(width, deriveSeed(seed, t), codomainWidth, strategy)) {
      successes++;
    }

    if (options.showProgress && ((t + 1) % progressEvery === 0 || t + 1 === trials)) {
      const pct = ((successes / (t + 1)) * 100).toFixed(1);
      process.stderr.write(`\r[trial ${t + 1}/${trials}] P(independent)=${pct}%`);
    }
  }

  if (options.showProgress) {
    process.stderr.write("\n");
  }

  return new IndependenceEstimate(width, trials, successes);
}
