import test from "node:test";
import assert from "node:assert/strict";
import { computeNextIdleDelay, computeTickTiming } from "../tick-timing";

test("computeTickTiming derives the tick and idle ceiling from the fps cap", () => {
  assert.deepEqual(computeTickTiming(60), { tickIntervalMs: 16, maxIdleDelayMs: 64 });
  assert.deepEqual(computeTickTiming(200), { tickIntervalMs: 5, maxIdleDelayMs: 20 });
  assert.deepEqual(computeTickTiming(1000), { tickIntervalMs: 1, maxIdleDelayMs: 16 });
  assert.deepEqual(computeTickTiming(5), { tickIntervalMs: 200, maxIdleDelayMs: 200 });
});

test("computeTickTiming falls back to 60 fps for unusable caps", () => {
  assert.deepEqual(computeTickTiming(0), computeTickTiming(60));
  assert.deepEqual(computeTickTiming(Number.NaN), computeTickTiming(60));
});

test("computeNextIdleDelay doubles up to the ceiling", () => {
  assert.equal(computeNextIdleDelay(0, 16, 64), 16);
  assert.equal(computeNextIdleDelay(16, 16, 64), 32);
  assert.equal(computeNextIdleDelay(32, 16, 64), 64);
  assert.equal(computeNextIdleDelay(64, 16, 64), 64);
});
