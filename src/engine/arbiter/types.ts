import type { BeatLayoutInput } from "../../core/layout/beatLayout";
import type { BeatLayout, ConnectionState, TempoBounds, Tick, TickSource } from "../../core/types";
import type { TimerHost } from "../clock/types";
import type { BeatDispatcher } from "../dispatch/BeatDispatcher";
import type { ExternalClock, ExternalClockConnector, Subscription } from "../external/types";

export type ArbiterMode =
  | { kind: "disconnected" }
  | { kind: "connected"; clock: ExternalClock; tickSub: Subscription };

export type ConfigChange = { kind: "tempo"; bpm: number } | { kind: "layout"; layout: BeatLayoutInput };

export type ArbiterSnapshot = {
  tempo: number;
  layout: BeatLayout;
  playing: boolean;
  connection: ConnectionState;
  source: TickSource | "idle";
};

export type ArbiterEvents = {
  onTick?: (tick: Tick, source: TickSource) => void;
  onConnectionChange?: (state: ConnectionState) => void;
  onError?: (details: string) => void;
};

export type ArbiterLogger = Pick<Console, "log" | "warn">;

export type TickArbiterOptions = {
  connector?: ExternalClockConnector;
  dispatch?: BeatDispatcher;

  tempoBounds?: Partial<TempoBounds>;
  initialBpm?: number;
  initialLayout?: BeatLayoutInput;

  timers?: TimerHost;
  /** Monotonic ms clock for tap timestamps (default: performance.now). */
  now?: () => number;
  /**
   * Re-posts collaborator callbacks onto the control sequence before they
   * touch state. Hosts delivering ticks from another thread must supply one.
   */
  runOnControl?: (task: () => void) => void;

  logger?: ArbiterLogger;
  events?: ArbiterEvents;
};
