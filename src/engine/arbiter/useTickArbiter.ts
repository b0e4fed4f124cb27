import { useCallback, useEffect, useRef } from "react";
import { useStore } from "zustand";

import TickArbiter from "./TickArbiter";
import type { TickArbiterOptions } from "./types";

/**
 * Binds one TickArbiter to a component's lifetime: attached on mount,
 * detached on unmount. Options are read once, at first render.
 */
function useTickArbiter(options: TickArbiterOptions) {
  const arbiterRef = useRef<TickArbiter | null>(null);

  if (!arbiterRef.current) {
    arbiterRef.current = new TickArbiter(options);
  }
  const arbiter = arbiterRef.current;

  useEffect(() => {
    arbiter.attach();
    return () => arbiter.detach();
  }, [arbiter]);

  const bpm = useStore(arbiter.tempoStore, (s) => s.tempo.bpm);
  const layout = useStore(arbiter.layoutStore, (s) => s.layout);
  const isPlaying = useStore(arbiter.sessionStore, (s) => s.isPlaying);
  const connection = useStore(arbiter.sessionStore, (s) => s.connection);

  const start = useCallback(() => arbiter.start(), [arbiter]);
  const stop = useCallback(() => arbiter.stop(), [arbiter]);
  const toggle = useCallback(() => arbiter.toggle(), [arbiter]);
  const tap = useCallback(() => arbiter.onTapTempo(), [arbiter]);
  const setTempo = useCallback((value: number) => arbiter.setTempo(value), [arbiter]);

  return { arbiter, bpm, layout, isPlaying, connection, start, stop, toggle, tap, setTempo };
}

export default useTickArbiter;
