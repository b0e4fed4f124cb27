import type { BeatLayout } from "../types";

export const MIN_BEATS = 1;
export const MAX_BEATS = 8;

export const MIN_SUBDIVISIONS = 1;
export const MAX_SUBDIVISIONS = 4;

export const DEFAULT_BEAT_LAYOUT: BeatLayout = Object.freeze({
  beats: 4,
  subdivisions: 1,
  gaps: Object.freeze([]),
  emphasizeFirstBeat: true,
  sound: true,
});
