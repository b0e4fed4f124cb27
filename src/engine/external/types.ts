import type { Tick } from "../../core/types";

export type ExternalClockParams = {
  beats: number;
  subdivisions: number;
  gaps: number[];
  tempo: number;
  emphasizeFirstBeat: boolean;
  sound: boolean;
  playing: boolean;
};

export type Subscription = { remove: () => void };

/**
 * The authoritative, sound-producing clock. `update` may be async; a
 * rejection is reported, never retried.
 */
export interface ExternalClock {
  update(params: Partial<ExternalClockParams>): void | Promise<void>;
  addListener(eventName: "onTick", listener: (tick: Tick) => void): Subscription;
}

export type ExternalClockConnection = {
  onConnected: (clock: ExternalClock) => void;
  onDisconnected: () => void;
};

/** Lifecycle of the process hosting the external clock (bind/unbind). */
export interface ExternalClockConnector {
  bind(connection: ExternalClockConnection): void;
  unbind(): void;
}
