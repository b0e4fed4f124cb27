import { clampBeats } from "../../core/layout/beatLayout";
import { beatIntervalMs } from "../../core/tempo/tempo";
import { type ClockEvents, globalTimerHost, type TimerHandle, type TimerHost } from "./types";

type FallbackClockOptions = {
  /** Read on every firing, so tempo changes apply from the next beat. */
  getBpm: () => number;
  getBeats: () => number;
  /** Checked before each firing; false ends the run without a tick. */
  isEligible: () => boolean;
  timers?: TimerHost;
  events?: ClockEvents;
};

class FallbackClock {
  private tickTimeoutId: TimerHandle | null = null;

  private beatIndex = 1;

  private readonly getBpm: () => number;

  private readonly getBeats: () => number;

  private readonly isEligible: () => boolean;

  private readonly timers: TimerHost;

  private events: ClockEvents;

  constructor({ getBpm, getBeats, isEligible, timers = globalTimerHost, events = {} }: FallbackClockOptions) {
    this.getBpm = getBpm;
    this.getBeats = getBeats;
    this.isEligible = isEligible;
    this.timers = timers;
    this.events = events;
  }

  get isActive(): boolean {
    return this.tickTimeoutId !== null;
  }

  start() {
    this.stop();
    this.beatIndex = 1;
    this.schedule(0);
  }

  stop() {
    if (this.tickTimeoutId !== null) {
      this.timers.clearTimeout(this.tickTimeoutId);
      this.tickTimeoutId = null;
    }
  }

  private schedule(delayMs: number) {
    this.tickTimeoutId = this.timers.setTimeout(() => this.tick(), delayMs);
  }

  private tick() {
    this.tickTimeoutId = null;
    if (!this.isEligible()) return;

    this.events.onTick?.({ beatIndex: this.beatIndex });
    // A tick listener may have stopped or restarted us.
    if (this.tickTimeoutId !== null || !this.isEligible()) return;

    const beats = clampBeats(this.getBeats());
    this.beatIndex = this.beatIndex >= beats ? 1 : this.beatIndex + 1;

    // Measured from now, not from the intended firing time; drift is not compensated.
    this.schedule(beatIntervalMs(this.getBpm()));
  }
}

export default FallbackClock;
