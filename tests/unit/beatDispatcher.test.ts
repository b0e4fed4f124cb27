import assert from "node:assert/strict";
import test from "node:test";

import { createBeatDispatcher } from "../../src/engine/dispatch/BeatDispatcher";

const makeTargets = (count: number) => {
  const blinks: number[] = [];
  const targets = Array.from({ length: count }, (_, i) => ({ blink: () => blinks.push(i + 1) }));
  return { blinks, targets };
};

test("beat index maps to the matching target", () => {
  const { blinks, targets } = makeTargets(8);
  const dispatch = createBeatDispatcher(targets);

  dispatch(1);
  dispatch(5);
  dispatch(8);

  assert.deepEqual(blinks, [1, 5, 8]);
});

test("indices outside 1..8 are ignored", () => {
  const { blinks, targets } = makeTargets(8);
  const dispatch = createBeatDispatcher(targets);

  dispatch(0);
  dispatch(9);
  dispatch(-3);
  dispatch(2.5);

  assert.deepEqual(blinks, []);
});

test("missing targets are ignored", () => {
  const { blinks, targets } = makeTargets(3);
  const dispatch = createBeatDispatcher(targets);

  dispatch(3);
  dispatch(4);

  assert.deepEqual(blinks, [3]);
});
