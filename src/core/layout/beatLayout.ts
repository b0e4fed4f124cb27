import { DEFAULT_BEAT_LAYOUT, MAX_BEATS, MAX_SUBDIVISIONS, MIN_BEATS, MIN_SUBDIVISIONS } from "../constants/layout";
import type { BeatLayout } from "../types";
import { clampInt } from "../../utils/math/clampInt";

export type BeatLayoutInput = Partial<{
  beats: number;
  subdivisions: number;
  gaps: readonly number[];
  emphasizeFirstBeat: boolean;
  sound: boolean;
}>;

export const clampBeats = (value: number) => clampInt(value, MIN_BEATS, MAX_BEATS, DEFAULT_BEAT_LAYOUT.beats);

const normalizeGaps = (gaps: readonly number[], beats: number): number[] => {
  const kept = new Set<number>();
  for (const g of gaps) {
    if (Number.isInteger(g) && g >= 1 && g <= beats) kept.add(g);
  }
  return Array.from(kept).sort((a, b) => a - b);
};

/**
 * Merges `input` over `previous` and returns a frozen, valid layout.
 * Gaps that fall outside the (new) beat count are dropped.
 */
export function normalizeBeatLayout(input: BeatLayoutInput = {}, previous: BeatLayout = DEFAULT_BEAT_LAYOUT): BeatLayout {
  const beats = input.beats === undefined ? previous.beats : clampBeats(input.beats);
  const subdivisions =
    input.subdivisions === undefined
      ? previous.subdivisions
      : clampInt(input.subdivisions, MIN_SUBDIVISIONS, MAX_SUBDIVISIONS, DEFAULT_BEAT_LAYOUT.subdivisions);

  return Object.freeze({
    beats,
    subdivisions,
    gaps: Object.freeze(normalizeGaps(input.gaps ?? previous.gaps, beats)),
    emphasizeFirstBeat: input.emphasizeFirstBeat ?? previous.emphasizeFirstBeat,
    sound: input.sound ?? previous.sound,
  });
}

export function isGap(layout: BeatLayout, beatIndex: number): boolean {
  return layout.gaps.includes(beatIndex);
}
