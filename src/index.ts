export { default as TickArbiter } from "./engine/arbiter/TickArbiter";
export { default as useTickArbiter } from "./engine/arbiter/useTickArbiter";
export type {
  ArbiterEvents,
  ArbiterLogger,
  ArbiterSnapshot,
  ConfigChange,
  TickArbiterOptions,
} from "./engine/arbiter/types";

export { default as FallbackClock } from "./engine/clock/FallbackClock";
export { globalTimerHost } from "./engine/clock/types";
export type { ClockEvents, TimerHandle, TimerHost } from "./engine/clock/types";

export { default as TapTempoEstimator } from "./engine/tap/TapTempoEstimator";

export { createBeatDispatcher } from "./engine/dispatch/BeatDispatcher";
export type { BeatDispatcher, BlinkTarget } from "./engine/dispatch/BeatDispatcher";

export { createEventModuleClock } from "./engine/external/EventModuleClock";
export type { ClockEventModule, EventModuleClock, ModuleClockEvents } from "./engine/external/EventModuleClock";
export type {
  ExternalClock,
  ExternalClockConnection,
  ExternalClockConnector,
  ExternalClockParams,
  Subscription,
} from "./engine/external/types";

export { clampTempo, createTempo, resolveTempoBounds } from "./core/tempo/tempo";
export { normalizeBeatLayout } from "./core/layout/beatLayout";
export type { BeatLayoutInput } from "./core/layout/beatLayout";
export { DEFAULT_TEMPO_BOUNDS, LARGE_TEMPO_STEP, TAP_WINDOW_MS } from "./core/constants/tempo";
export { DEFAULT_BEAT_LAYOUT, MAX_BEATS } from "./core/constants/layout";
export type { BeatLayout, ConnectionState, Tempo, TempoBounds, Tick, TickSource } from "./core/types";
