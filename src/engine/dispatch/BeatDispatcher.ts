import { MAX_BEATS } from "../../core/constants/layout";

export type BlinkTarget = {
  blink: () => void;
};

export type BeatDispatcher = (beatIndex: number) => void;

export function createBeatDispatcher(targets: readonly BlinkTarget[]): BeatDispatcher {
  return (beatIndex) => {
    // Stale ticks can carry an index from a previous beat count.
    if (!Number.isInteger(beatIndex) || beatIndex < 1 || beatIndex > MAX_BEATS) return;
    targets[beatIndex - 1]?.blink();
  };
}

export default createBeatDispatcher;
