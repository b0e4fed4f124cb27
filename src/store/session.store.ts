import { createStore } from "zustand/vanilla";

import type { ConnectionState } from "../core/types";

export type SessionState = {
  isPlaying: boolean;
  setPlaying: (value: boolean) => void;

  connection: ConnectionState;
  setConnection: (value: ConnectionState) => void;
};

export const createSessionStore = () =>
  createStore<SessionState>()((set) => ({
    isPlaying: false,
    setPlaying: (value) => set({ isPlaying: value }),

    connection: "disconnected",
    setConnection: (value) => set({ connection: value }),
  }));

export type SessionStore = ReturnType<typeof createSessionStore>;
