import { DEFAULT_TEMPO_BOUNDS, MS_PER_MINUTE } from "../constants/tempo";
import type { Tempo, TempoBounds } from "../types";

/**
 * Normalizes caller-supplied bounds: integer values, min >= 1, max >= min,
 * default inside [min, max].
 */
export function resolveTempoBounds(bounds: Partial<TempoBounds> = {}): TempoBounds {
  const pick = (value: number | undefined, fallback: number) =>
    typeof value === "number" && Number.isFinite(value) ? Math.round(value) : fallback;

  const min = Math.max(1, pick(bounds.min, DEFAULT_TEMPO_BOUNDS.min));
  const max = Math.max(min, pick(bounds.max, DEFAULT_TEMPO_BOUNDS.max));
  const fallback = pick(bounds.default, DEFAULT_TEMPO_BOUNDS.default);

  return {
    min,
    max,
    default: Math.min(max, Math.max(min, fallback)),
  };
}

export function clampTempo(bpm: number, bounds: TempoBounds = DEFAULT_TEMPO_BOUNDS): number {
  if (Number.isNaN(bpm)) return bounds.default;
  return Math.min(bounds.max, Math.max(bounds.min, Math.round(bpm)));
}

export function createTempo(bpm: number, bounds: TempoBounds = DEFAULT_TEMPO_BOUNDS): Tempo {
  return Object.freeze({ bpm: clampTempo(bpm, bounds) });
}

// Integer division, same as the external clock: the effective tempo runs a little fast at high bpm.
export function beatIntervalMs(bpm: number): number {
  return Math.trunc(MS_PER_MINUTE / bpm);
}
