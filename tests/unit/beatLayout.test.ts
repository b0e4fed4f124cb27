import assert from "node:assert/strict";
import test from "node:test";

import { DEFAULT_BEAT_LAYOUT } from "../../src/core/constants/layout";
import { clampBeats, normalizeBeatLayout } from "../../src/core/layout/beatLayout";

test("normalizeBeatLayout fills defaults", () => {
  assert.deepEqual(normalizeBeatLayout(), {
    beats: 4,
    subdivisions: 1,
    gaps: [],
    emphasizeFirstBeat: true,
    sound: true,
  });
});

test("normalizeBeatLayout clamps beats and subdivisions", () => {
  const layout = normalizeBeatLayout({ beats: 12, subdivisions: 0 });

  assert.equal(layout.beats, 8);
  assert.equal(layout.subdivisions, 1);
  assert.equal(normalizeBeatLayout({ beats: Number.NaN }).beats, 4);
});

test("normalizeBeatLayout sorts, de-duplicates and bounds gaps", () => {
  const layout = normalizeBeatLayout({ beats: 4, gaps: [3, 0, 2, 3, 5, 2.5] });

  assert.deepEqual(layout.gaps, [2, 3]);
});

test("shrinking the beat count drops gaps past the new end", () => {
  const wide = normalizeBeatLayout({ beats: 7, gaps: [2, 6, 7] });
  const narrow = normalizeBeatLayout({ beats: 5 }, wide);

  assert.deepEqual(narrow.gaps, [2]);
  assert.notEqual(narrow, wide);
  assert.deepEqual(wide.gaps, [2, 6, 7]);
});

test("normalizeBeatLayout keeps fields not in the input", () => {
  const previous = normalizeBeatLayout({ beats: 3, emphasizeFirstBeat: false, sound: false });
  const next = normalizeBeatLayout({ subdivisions: 3 }, previous);

  assert.deepEqual(next, { beats: 3, subdivisions: 3, gaps: [], emphasizeFirstBeat: false, sound: false });
  assert.ok(Object.isFrozen(next));
  assert.ok(Object.isFrozen(DEFAULT_BEAT_LAYOUT));
});

test("clampBeats falls back to four for non-finite values", () => {
  assert.equal(clampBeats(Infinity), 4);
  assert.equal(clampBeats(0), 1);
  assert.equal(clampBeats(6.7), 6);
});
