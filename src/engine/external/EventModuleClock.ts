import type { Tick } from "../../core/types";
import type { ExternalClock, ExternalClockParams, Subscription } from "./types";

export type ModuleTickEvent = {
  beat: number;
  atAudioTimeMs?: number;
};

export type ModuleStateEvent = {
  status: "idle" | "starting" | "running" | "stopping" | "error";
  message?: string;
};

/** Shape of an event-emitting engine module (native bridge, worker proxy, ...). */
export type ClockEventModule = {
  update(params: Partial<ExternalClockParams>): Promise<void>;
  addListener(eventName: "onTick", listener: (e: ModuleTickEvent) => void): Subscription;
  addListener(eventName: "onState", listener: (e: ModuleStateEvent) => void): Subscription;
};

export type ModuleClockEvents = {
  onStateChange?: (state: "ready" | "error", details?: string) => void;
};

export type EventModuleClock = ExternalClock & {
  dispose: () => void;
};

export function createEventModuleClock(module: ClockEventModule, events: ModuleClockEvents = {}): EventModuleClock {
  const stateSub = module.addListener("onState", (e) => {
    if (e.status === "error") {
      events.onStateChange?.("error", e.message ?? "engine error");
    } else {
      events.onStateChange?.("ready", e.message);
    }
  });

  const tickSubs = new Set<Subscription>();

  return {
    update: (params) => module.update(params),

    addListener: (_eventName, listener: (tick: Tick) => void) => {
      const inner = module.addListener("onTick", (e) => listener({ beatIndex: e.beat }));
      const sub: Subscription = {
        remove: () => {
          inner.remove();
          tickSubs.delete(sub);
        },
      };
      tickSubs.add(sub);
      return sub;
    },

    dispose: () => {
      tickSubs.forEach((sub) => sub.remove());
      stateSub.remove();
    },
  };
}
