import { createStore } from "zustand/vanilla";

import { LARGE_TEMPO_STEP } from "../core/constants/tempo";
import { createTempo } from "../core/tempo/tempo";
import type { Tempo, TempoBounds } from "../core/types";
import TapTempoEstimator from "../engine/tap/TapTempoEstimator";

export type TempoState = {
  tempo: Tempo;
  bounds: TempoBounds;
  setBpm: (bpm: number) => void;
  increment: () => void;
  decrement: () => void;
  incrementLarge: () => void;
  decrementLarge: () => void;
  applyTap: (now: number) => number | null;
};

export const createTempoStore = (bounds: TempoBounds, initialBpm = bounds.default) => {
  const estimator = new TapTempoEstimator({ bounds });

  return createStore<TempoState>()((set, get) => {
    // Refuses at the bound instead of clamping past it.
    const step = (delta: 1 | -1) => {
      const { bpm } = get().tempo;
      const next = bpm + delta;
      if (next > bounds.max || next < bounds.min) return;
      set({ tempo: createTempo(next, bounds) });
    };

    const repeat = (delta: 1 | -1) => {
      for (let i = 0; i < LARGE_TEMPO_STEP; i += 1) step(delta);
    };

    return {
      tempo: createTempo(initialBpm, bounds),
      bounds,
      setBpm: (bpm) => set({ tempo: createTempo(bpm, bounds) }),
      increment: () => step(1),
      decrement: () => step(-1),
      incrementLarge: () => repeat(1),
      decrementLarge: () => repeat(-1),
      applyTap: (now) => {
        const nextBpm = estimator.tap(now);
        if (nextBpm !== null) set({ tempo: createTempo(nextBpm, bounds) });
        return nextBpm;
      },
    };
  });
};

export type TempoStore = ReturnType<typeof createTempoStore>;
