import { strict as assert } from "node:assert";
import test from "node:test";

import {
  createFixedSimulator,
  createGaussianSimulator,
  createSeededRandom,
} from "../src/strategies/simulation.js";

test("seeded random is reproducible and stays in [0, 1)", () => {
  const a = createSeededRandom(42);
  const b = createSeededRandom(42);
  for (let i = 0; i < 1_000; i++) {
    const value = a();
    assert.equal(value, b());
    assert.ok(value >= 0 && value < 1);
  }
});

test("gaussian simulator returns the requested number of samples", () => {
  const simulator = createGaussianSimulator({ random: createSeededRandom(1) });
  assert.equal(simulator.sample(0).length, 0);
  assert.equal(simulator.sample(25).length, 25);
});

test("gaussian simulator centres on the mean with the configured spread", () => {
  const simulator = createGaussianSimulator({ random: createSeededRandom(2024) });
  const values = simulator.sample(20_000);

  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
  const stdDev = Math.sqrt(variance);

  assert.ok(Math.abs(mean) < 0.00005, `mean ${mean} too far from 0`);
  assert.ok(Math.abs(stdDev - 0.0005) < 0.00005, `std-dev ${stdDev} too far from 0.0005`);
});

test("gaussian simulator honours a custom mean and std-dev", () => {
  const simulator = createGaussianSimulator({
    mean: 1,
    stdDev: 0,
    random: createSeededRandom(3),
  });
  assert.deepEqual(simulator.sample(3), [1, 1, 1]);
});

test("a random source returning 0.5 twice yields the mean minus the spread scale", () => {
  // u1 = 0.5, u2 = 0.5 -> sqrt(2 ln 2) * cos(pi)
  const simulator = createGaussianSimulator({ mean: 0, stdDev: 1, random: () => 0.5 });
  const [value = Number.NaN] = simulator.sample(1);
  assert.ok(Math.abs(value + Math.sqrt(2 * Math.LN2)) < 1e-12);
});

test("fixed simulator replays values in order and then runs dry", () => {
  const simulator = createFixedSimulator([0.1, 0.2, 0.3]);
  assert.deepEqual(simulator.sample(2), [0.1, 0.2]);
  assert.deepEqual(simulator.sample(1), [0.3]);
  assert.throws(() => simulator.sample(1), /Fixed simulator exhausted: requested 1, 0 remaining/);
});
