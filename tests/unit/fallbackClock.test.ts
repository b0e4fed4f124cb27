import assert from "node:assert/strict";
import test from "node:test";

import FallbackClock from "../../src/engine/clock/FallbackClock";
import { FakeTimers } from "./helpers/fakeTimers";

const setup = (initial: { bpm?: number; beats?: number } = {}) => {
  const timers = new FakeTimers();
  const config = { bpm: initial.bpm ?? 120, beats: initial.beats ?? 4, eligible: true };
  const beats: number[] = [];
  const at: number[] = [];
  const clock = new FallbackClock({
    getBpm: () => config.bpm,
    getBeats: () => config.beats,
    isEligible: () => config.eligible,
    timers,
    events: {
      onTick: (tick) => {
        beats.push(tick.beatIndex);
        at.push(timers.now);
      },
    },
  });
  return { timers, config, beats, at, clock };
};

test("first tick is beat 1, posted without delay", () => {
  const { timers, beats, clock } = setup();

  clock.start();
  assert.deepEqual(beats, []);

  timers.advance(0);
  assert.deepEqual(beats, [1]);
});

test("beats cycle 1..4 at the configured interval", () => {
  const { timers, beats, at, clock } = setup({ bpm: 120, beats: 4 });

  clock.start();
  timers.advance(500 * 9);

  assert.deepEqual(beats, [1, 2, 3, 4, 1, 2, 3, 4, 1, 2]);
  assert.deepEqual(at, [0, 500, 1000, 1500, 2000, 2500, 3000, 3500, 4000, 4500]);
});

test("interval uses truncating division", () => {
  const { timers, at, clock } = setup({ bpm: 7 });

  clock.start();
  timers.advance(8571 * 2);

  assert.deepEqual(at, [0, 8571, 17142]);
});

test("tempo and beat count are read on every firing", () => {
  const { timers, config, beats, at, clock } = setup({ bpm: 120, beats: 4 });

  clock.start();
  timers.advance(250);
  config.bpm = 60;
  config.beats = 2;
  timers.advance(2_250);

  assert.deepEqual(beats, [1, 2, 1, 2]);
  assert.deepEqual(at, [0, 500, 1500, 2500]);
});

test("beat count is clamped into 1..8", () => {
  const { timers, config, beats, clock } = setup({ bpm: 600, beats: 20 });

  clock.start();
  timers.advance(100 * 9);
  assert.deepEqual(beats, [1, 2, 3, 4, 5, 6, 7, 8, 1, 2]);

  // Index 3 was already queued before the change.
  config.beats = 0;
  timers.advance(100 * 3);
  assert.deepEqual(beats.slice(-3), [3, 1, 1]);
});

test("an ineligible firing emits nothing and does not reschedule", () => {
  const { timers, config, beats, clock } = setup();

  clock.start();
  timers.advance(500);
  config.eligible = false;
  timers.advance(5_000);

  assert.deepEqual(beats, [1, 2]);
  assert.equal(clock.isActive, false);
  assert.equal(timers.pendingCount, 0);
});

test("stop cancels the pending firing synchronously", () => {
  const { timers, beats, clock } = setup();

  clock.start();
  timers.advance(0);
  clock.stop();
  clock.stop();

  assert.equal(clock.isActive, false);
  assert.equal(timers.pendingCount, 0);
  timers.advance(10_000);
  assert.deepEqual(beats, [1]);
});

test("restarting resets to beat 1", () => {
  const { timers, beats, clock } = setup();

  clock.start();
  timers.advance(1_000);
  clock.start();
  timers.advance(0);

  assert.deepEqual(beats, [1, 2, 3, 1]);
  assert.equal(timers.pendingCount, 1);
});
