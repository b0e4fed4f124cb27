import { createStore } from "zustand/vanilla";

import { type BeatLayoutInput, isGap, normalizeBeatLayout } from "../core/layout/beatLayout";
import type { BeatLayout } from "../core/types";

export type LayoutState = {
  layout: BeatLayout;
  setLayout: (input: BeatLayoutInput) => void;
  setBeats: (beats: number) => void;
  setSubdivisions: (subdivisions: number) => void;
  setGaps: (gaps: readonly number[]) => void;
  toggleGap: (beatIndex: number) => void;
  setEmphasizeFirstBeat: (value: boolean) => void;
  setSound: (value: boolean) => void;
};

export const createLayoutStore = (initial: BeatLayoutInput = {}) =>
  createStore<LayoutState>()((set, get) => {
    // Layouts are replaced wholesale, never mutated.
    const write = (input: BeatLayoutInput) => set((s) => ({ layout: normalizeBeatLayout(input, s.layout) }));

    return {
      layout: normalizeBeatLayout(initial),
      setLayout: write,
      setBeats: (beats) => write({ beats }),
      setSubdivisions: (subdivisions) => write({ subdivisions }),
      setGaps: (gaps) => write({ gaps }),
      toggleGap: (beatIndex) => {
        const { layout } = get();
        const gaps = isGap(layout, beatIndex) ? layout.gaps.filter((g) => g !== beatIndex) : [...layout.gaps, beatIndex];
        write({ gaps });
      },
      setEmphasizeFirstBeat: (value) => write({ emphasizeFirstBeat: value }),
      setSound: (value) => write({ sound: value }),
    };
  });

export type LayoutStore = ReturnType<typeof createLayoutStore>;
