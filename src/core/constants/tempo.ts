import type { TempoBounds } from "../types";

export const MS_PER_MINUTE = 60_000;

export const DEFAULT_TEMPO_BOUNDS: TempoBounds = {
  min: 1,
  max: 400,
  default: 100,
};

// Long-press step on the +/- controls
export const LARGE_TEMPO_STEP = 10;

export const TAP_WINDOW_MS = 5_000;
