import assert from "node:assert/strict";
import test from "node:test";

import { DEFAULT_TEMPO_BOUNDS } from "../../src/core/constants/tempo";
import TapTempoEstimator from "../../src/engine/tap/TapTempoEstimator";

const makeEstimator = () => new TapTempoEstimator({ bounds: DEFAULT_TEMPO_BOUNDS });

test("a single tap yields no estimate", () => {
  const estimator = makeEstimator();

  assert.equal(estimator.tap(1_000), null);
});

test("three taps 500ms apart estimate 120 bpm", () => {
  const estimator = makeEstimator();

  estimator.tap(10_000);
  assert.equal(estimator.tap(10_500), 120);
  assert.equal(estimator.tap(11_000), 120);
});

test("taps older than the window are pruned", () => {
  const estimator = makeEstimator();

  estimator.tap(0);
  assert.equal(estimator.tap(6_000), null);
  assert.equal(estimator.size, 1);
  assert.equal(estimator.tap(6_500), 120);
  assert.equal(estimator.size, 2);
});

test("a tap exactly at the window edge is kept", () => {
  const estimator = makeEstimator();

  estimator.tap(0);
  // gap 5000ms -> 12 bpm
  assert.equal(estimator.tap(5_000), 12);
  assert.equal(estimator.size, 2);
});

test("the mean interval is truncated before converting", () => {
  const estimator = makeEstimator();

  estimator.tap(0);
  estimator.tap(500);
  // gaps 500 and 501 -> mean 500.5 -> 500 -> 120 bpm
  assert.equal(estimator.tap(1_001), 120);
});

test("bpm uses integer division", () => {
  const estimator = makeEstimator();

  estimator.tap(0);
  // 60000 / 700 = 85.7
  assert.equal(estimator.tap(700), 85);
});

test("sub-millisecond taps produce no estimate", () => {
  const estimator = makeEstimator();

  estimator.tap(100);
  assert.equal(estimator.tap(100.4), null);
  assert.equal(estimator.tap(100.8), null);
});

test("estimates are clamped to the tempo bounds", () => {
  const estimator = new TapTempoEstimator({ bounds: { min: 30, max: 300, default: 100 } });

  estimator.tap(0);
  assert.equal(estimator.tap(100), 300);

  const slow = new TapTempoEstimator({ bounds: { min: 30, max: 300, default: 100 } });
  slow.tap(0);
  assert.equal(slow.tap(4_000), 30);
});
