import { MS_PER_MINUTE, TAP_WINDOW_MS } from "../../core/constants/tempo";
import { clampTempo } from "../../core/tempo/tempo";
import type { TempoBounds } from "../../core/types";

type TapTempoOptions = {
  bounds: TempoBounds;
  windowMs?: number;
};

class TapTempoEstimator {
  private taps: number[] = [];

  private bounds: TempoBounds;

  private windowMs: number;

  constructor({ bounds, windowMs = TAP_WINDOW_MS }: TapTempoOptions) {
    this.bounds = bounds;
    this.windowMs = windowMs;
  }

  get size(): number {
    return this.taps.length;
  }

  /**
   * Records a tap at `now` (ms, monotonic) and returns the estimated bpm,
   * or null when the window holds a single tap or the taps are too close to
   * yield a whole-millisecond interval.
   */
  tap(now: number): number | null {
    this.taps = this.taps.filter((t) => now - t <= this.windowMs);
    this.taps.push(now);

    const interval = this.averageIntervalMs();
    if (interval === null) return null;
    return clampTempo(Math.trunc(MS_PER_MINUTE / interval), this.bounds);
  }

  private averageIntervalMs(): number | null {
    if (this.taps.length < 2) return null;
    let total = 0;
    for (let i = 1; i < this.taps.length; i += 1) {
      total += this.taps[i] - this.taps[i - 1];
    }
    const avg = Math.trunc(total / (this.taps.length - 1));
    return avg > 0 ? avg : null;
  }
}

export default TapTempoEstimator;
