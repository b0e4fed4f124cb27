import type { Tick } from "../../core/types";

export type TimerHandle = ReturnType<typeof setTimeout> | number;

/**
 * Deferred-callback host. Defaults to the global timers; tests and hosts
 * with their own loop supply their own.
 */
export type TimerHost = {
  setTimeout: (callback: () => void, delayMs: number) => TimerHandle;
  clearTimeout: (handle: TimerHandle) => void;
};

export type ClockEvents = {
  onTick?: (tick: Tick) => void;
};

export const globalTimerHost: TimerHost = {
  setTimeout: (callback, delayMs) => setTimeout(callback, delayMs),
  clearTimeout: (handle) => clearTimeout(handle),
};
