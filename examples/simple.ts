/**
 * Simple example: recovering a hidden XOR period.
 *
 * Run with: npm run example
 */

import {
  SimonSimulation,
  RankDeficientError,
  estimateIndependenceProbability,
  toBitString,
} from "../ts/index.js";

// Test 1: periodic oracle (should recover s)
console.log("Test 1: periodic oracle, s=101101 (should recover s)...\n");

const result1 = SimonSimulation.forWidth(6)
  .secret(0b101101)
  .seed(2024)
  .maxAttempts(20)
  .showProgress()
  .run();

console.log("\nResult:", result1.toString());
console.log("Candidates:", result1.candidatesString());
for (const { y } of result1.batch) {
  console.log(`  y=${toBitString(y, result1.width)}`);
}
console.log(result1.isCorrect() ? "OK: secret recovered\n" : "MISMATCH\n");

// Test 2: injective oracle (no candidate should verify)
console.log("---\nTest 2: injective oracle (should report one-to-one)...\n");

const result2 = SimonSimulation.forWidth(6).injective().seed(2024).run();

console.log("Result:", result2.toString());
for (const check of result2.verification) {
  console.log(`  f(${toBitString(check.candidate, 6)}) == f(0)? ${check.matches}`);
}

// Test 3: single batch, assertion style
console.log("\n---\nTest 3: Assertion style (assertUniquelyDetermined)...\n");

const result3 = SimonSimulation.forWidth(10).randomSecret().seed(5).run();
try {
  result3.assertUniquelyDetermined();
  console.log("Batch was independent:", result3.toString());
} catch (e) {
  if (e instanceof RankDeficientError) {
    console.log("Caught RankDeficientError:", e.message);
  } else {
    throw e;
  }
}

// Test 4: how often is a single batch enough?
console.log("\n---\nTest 4: estimating P(independent) for n=10...\n");

const estimate = estimateIndependenceProbability(10, 1000, { seed: 1, showProgress: true });
const [low, high] = estimate.confidenceInterval();
console.log(estimate.toString());
console.log(`95% CI: [${(low * 100).toFixed(1)}%, ${(high * 100).toFixed(1)}%]`);
console.log(`Variance of runs to first success: ${estimate.variance.toFixed(2)}`);
