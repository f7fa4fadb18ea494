/**
 * High-level SimonSimulation API.
 *
 * Provides a builder-pattern interface for running the full protocol:
 * build an oracle, sample constraints, solve, verify.
 */

import type { Config, SolverStrategy } from "./types.js";
import { SolverStrategyValues } from "./types.js";
import { InvalidParameterError } from "./errors.js";
import { assertWidth } from "./bits.js";
import { SeededRandom, randomSeed } from "./rng.js";
import { MIN_WIDTH, assertSecret, makeOracle, randomSecret } from "./oracle.js";
import { ConstraintSampler } from "./sampler.js";
import { assertStrategy, isLinearlyIndependent, solve, verifyCandidates } from "./solver.js";
import { SimulationResult } from "./result.js";

/**
 * Default configuration for a width: square oracle, injective, elimination
 * solver, a single batch, fresh random seed.
 */
export function defaultConfig(width: number): Config {
  return {
    width,
    codomainWidth: width,
    secret: null,
    seed: randomSeed(),
    strategy: SolverStrategyValues.Elimination,
    maxAttempts: 1,
  };
}

/**
 * Check every field of a config.
 *
 * @throws InvalidParameterError on the first invalid field.
 */
export function validateConfig(config: Config): void {
  assertWidth("width", config.width, MIN_WIDTH);
  assertWidth("codomainWidth", config.codomainWidth, MIN_WIDTH);
  if (config.codomainWidth < config.width) {
    throw new InvalidParameterError(
      "codomainWidth",
      config.codomainWidth,
      `must be at least width (${config.width})`,
    );
  }
  if (config.secret !== null) {
    assertSecret(config.secret, config.width);
  }
  if (!Number.isInteger(config.seed)) {
    throw new InvalidParameterError("seed", config.seed, "must be an integer");
  }
  assertStrategy(config.strategy);
  if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
    throw new InvalidParameterError("maxAttempts", config.maxAttempts, "must be a positive integer");
  }
}

/**
 * SimonSimulation - Builder-pattern API for one protocol run.
 *
 * @example
 * ```typescript
 * import { SimonSimulation } from 'simon-sim';
 *
 * const result = SimonSimulation
 *   .forWidth(8)
 *   .secret(0b10110011)
 *   .seed(42)
 *   .maxAttempts(20) // redraw until the batch is independent
 *   .run();
 *
 * if (result.isPeriodic()) {
 *   console.log(`Recovered s=${result.recoveredSecretString()}`);
 * }
 * ```
 */
export class SimonSimulation {
  private config: Config;
  private _randomSecret = false;
  private _showProgress = false;

  private constructor(width: number) {
    this.config = defaultConfig(width);
  }

  /**
   * Start a simulation over n-bit inputs.
   *
   * The oracle is injective until `secret()` or `randomSecret()` is called.
   */
  static forWidth(width: number): SimonSimulation {
    return new SimonSimulation(width);
  }

  /** Set the output width m (default: width). */
  codomainWidth(m: number): this {
    this.config.codomainWidth = m;
    return this;
  }

  /** Hide the given nonzero secret in a periodic oracle. */
  secret(s: number): this {
    this.config.secret = s;
    this._randomSecret = false;
    return this;
  }

  /** Hide a uniformly random nonzero secret, drawn from the run's stream. */
  randomSecret(): this {
    this._randomSecret = true;
    return this;
  }

  /** Use an injective oracle. */
  injective(): this {
    this.config.secret = null;
    this._randomSecret = false;
    return this;
  }

  /** Set the random seed for reproducibility. */
  seed(s: number): this {
    this.config.seed = s;
    return this;
  }

  /** Choose the GF(2) solver. Default: elimination. */
  strategy(kind: SolverStrategy): this {
    this.config.strategy = kind;
    return this;
  }

  /**
   * Set how many batches may be drawn while looking for an independent one.
   *
   * Default: 1 (the single-batch protocol).
   */
  maxAttempts(k: number): this {
    this.config.maxAttempts = k;
    return this;
  }

  /**
   * Enable progress output to stderr.
   *
   * When enabled, prints one line per attempt:
   * `[attempt 2/20] 7 constraints, dependent`
   *
   * @param enabled Whether to show progress (default: true)
   */
  showProgress(enabled: boolean = true): this {
    this._showProgress = enabled;
    return this;
  }

  /** Snapshot of the current configuration. */
  getConfig(): Config {
    return { ...this.config };
  }

  /**
   * Run the protocol.
   *
   * This is the main entry point. It:
   * 1. Builds the oracle from the seed
   * 2. Draws batches of width - 1 constraints until one is independent
   *    or the attempt budget is spent
   * 3. Solves the last batch and checks each candidate against f(0)
   *
   * @returns Simulation result with candidates, verification and outcome
   */
  run(): SimulationResult {
    const rng = new SeededRandom(this.config.seed);
    const config: Config = this._randomSecret
      ? { ...this.config, secret: randomSecret(this.config.width, rng) }
      : { ...this.config };
    validateConfig(config);

    const { width, strategy, maxAttempts } = config;
    const oracle = makeOracle(config, rng);
    const sampler = new ConstraintSampler(oracle, rng);

    let batch = sampler.batch();
    let attempts = 1;
    let independent = isLinearlyIndependent(batch, width, strategy);
    this.reportAttempt(attempts, maxAttempts, batch.length, independent);

    while (!independent && attempts < maxAttempts) {
      batch = sampler.batch();
      attempts++;
      independent = isLinearlyIndependent(batch, width, strategy);
      this.reportAttempt(attempts, maxAttempts, batch.length, independent);
    }

    const candidates = solve(batch, width, strategy);

    return new SimulationResult({
      width,
      codomainWidth: config.codomainWidth,
      seed: config.seed,
      strategy,
      oracleKind: oracle.kind,
      trueSecret: oracle.secret,
      batch,
      independent,
      attempts,
      candidates,
      verification: verifyCandidates(oracle, candidates),
    });
  }

  private reportAttempt(
    attempt: number,
    maxAttempts: number,
    size: number,
    independent: boolean,
  ): void {
    if (!this._showProgress) return;
    const status = independent ? "independent" : "dependent";
    process.stderr.write(`[attempt ${attempt}/${maxAttempts}] ${size} constraints, ${status}\n`);
  }
}
