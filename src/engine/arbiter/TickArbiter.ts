import type { BeatLayoutInput } from "../../core/layout/beatLayout";
import { resolveTempoBounds } from "../../core/tempo/tempo";
import type { BeatLayout, ConnectionState, Tick, TickSource } from "../../core/types";
import { createLayoutStore, type LayoutStore } from "../../store/layout.store";
import { createSessionStore, type SessionStore } from "../../store/session.store";
import { createTempoStore, type TempoState, type TempoStore } from "../../store/tempo.store";
import FallbackClock from "../clock/FallbackClock";
import type { ExternalClock, ExternalClockParams, Subscription } from "../external/types";
import type { ArbiterMode, ArbiterSnapshot, ConfigChange, TickArbiterOptions } from "./types";

const runImmediately = (task: () => void) => task();

const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));

const layoutParams = (layout: BeatLayout): Partial<ExternalClockParams> => ({
  beats: layout.beats,
  subdivisions: layout.subdivisions,
  gaps: [...layout.gaps],
  emphasizeFirstBeat: layout.emphasizeFirstBeat,
  sound: layout.sound,
});

/**
 * Owns the single live tick source. While connected the external clock
 * ticks; while disconnected and playing the silent fallback clock does.
 * Transitions always stop one producer before starting the other.
 */
class TickArbiter {
  readonly tempoStore: TempoStore;

  readonly layoutStore: LayoutStore;

  readonly sessionStore: SessionStore;

  private mode: ArbiterMode = { kind: "disconnected" };

  private readonly fallback: FallbackClock;

  // Bumped on every attach/detach so callbacks from an old binding are ignored.
  private binding = 0;

  private attached = false;

  private readonly options: TickArbiterOptions;

  private readonly runOnControl: (task: () => void) => void;

  constructor(options: TickArbiterOptions = {}) {
    const { tempoBounds, initialBpm, initialLayout, timers, runOnControl = runImmediately } = options;
    const bounds = resolveTempoBounds(tempoBounds);

    this.options = options;
    this.runOnControl = runOnControl;
    this.tempoStore = createTempoStore(bounds, initialBpm);
    this.layoutStore = createLayoutStore(initialLayout);
    this.sessionStore = createSessionStore();

    this.fallback = new FallbackClock({
      getBpm: () => this.getTempo(),
      getBeats: () => this.layoutStore.getState().layout.beats,
      isEligible: () => this.mode.kind === "disconnected" && this.isPlaying,
      timers,
      events: {
        onTick: (tick) => this.deliver(tick, "fallback"),
      },
    });
  }

  private get logger() {
    return this.options.logger ?? console;
  }

  get isPlaying(): boolean {
    return this.sessionStore.getState().isPlaying;
  }

  get connection(): ConnectionState {
    return this.mode.kind;
  }

  getState(): ArbiterSnapshot {
    const playing = this.isPlaying;
    let source: ArbiterSnapshot["source"] = "idle";
    if (this.mode.kind === "connected") {
      source = playing ? "external" : "idle";
    } else if (this.fallback.isActive) {
      source = "fallback";
    }

    return {
      tempo: this.getTempo(),
      layout: this.layoutStore.getState().layout,
      playing,
      connection: this.mode.kind,
      source,
    };
  }

  // ---------- lifecycle ----------

  attach() {
    if (this.attached) return;
    this.attached = true;
    this.binding += 1;
    // Each attached session starts stopped.
    this.resetPlaying();

    const connector = this.options.connector;
    if (!connector) return;

    const binding = this.binding;
    const onControl = (task: () => void) =>
      this.runOnControl(() => {
        if (binding === this.binding) task();
      });

    try {
      connector.bind({
        onConnected: (clock) => onControl(() => this.onExternalConnected(clock)),
        onDisconnected: () => onControl(() => this.onExternalDisconnected()),
      });
    } catch (error) {
      // Never reaching the external clock is not fatal: playback stays on the fallback.
      this.report("bind failed", error);
    }
  }

  detach() {
    if (!this.attached) return;
    this.attached = false;
    this.binding += 1;

    try {
      this.options.connector?.unbind();
    } catch (error) {
      this.report("unbind failed", error);
    }

    this.resetPlaying();
    if (this.mode.kind === "connected") {
      this.leaveConnected();
      this.setConnection("disconnected");
    }
  }

  // ---------- external clock callbacks ----------

  onExternalConnected(clock: ExternalClock) {
    this.leaveConnected();

    const tickSub: Subscription = clock.addListener("onTick", (tick) =>
      this.runOnControl(() => {
        // Marshaled ticks can land after the subscription was dropped.
        if (this.mode.kind === "connected" && this.mode.tickSub === tickSub) this.onExternalTick(tick.beatIndex);
      })
    );
    this.mode = { kind: "connected", clock, tickSub };
    this.setConnection("connected");

    this.push({
      ...layoutParams(this.layoutStore.getState().layout),
      tempo: this.getTempo(),
      playing: this.isPlaying,
    });

    this.fallback.stop();
    this.logger.log("[arbiter] connected; external clock is live");
  }

  onExternalDisconnected() {
    if (this.mode.kind === "disconnected") return;

    this.leaveConnected();
    this.setConnection("disconnected");

    if (this.isPlaying) {
      this.fallback.start();
      this.logger.log("[arbiter] disconnected while playing; fallback clock is live (no sound)");
    } else {
      this.logger.log("[arbiter] disconnected");
    }
  }

  onExternalTick(beatIndex: number) {
    this.deliver({ beatIndex }, "external");
  }

  // ---------- transport ----------

  start() {
    if (this.isPlaying) return;
    this.sessionStore.getState().setPlaying(true);

    if (this.mode.kind === "connected") {
      this.push({ playing: true });
    } else {
      this.fallback.start();
    }
  }

  stop() {
    if (!this.isPlaying) return;
    this.sessionStore.getState().setPlaying(false);

    if (this.mode.kind === "connected") {
      this.push({ playing: false });
    } else {
      this.fallback.stop();
    }
  }

  toggle() {
    if (this.isPlaying) this.stop();
    else this.start();
  }

  // ---------- configuration ----------

  getTempo(): number {
    return this.tempoStore.getState().tempo.bpm;
  }

  setTempo(bpm: number) {
    this.onConfigChanged({ kind: "tempo", bpm });
  }

  setLayout(layout: BeatLayoutInput) {
    this.onConfigChanged({ kind: "layout", layout });
  }

  onConfigChanged(change: ConfigChange) {
    switch (change.kind) {
      case "tempo":
        this.tempoStore.getState().setBpm(change.bpm);
        this.push({ tempo: this.getTempo() });
        break;
      case "layout":
        this.layoutStore.getState().setLayout(change.layout);
        this.push(layoutParams(this.layoutStore.getState().layout));
        break;
    }
  }

  increment() {
    this.changeTempo((s) => s.increment());
  }

  decrement() {
    this.changeTempo((s) => s.decrement());
  }

  incrementLarge() {
    this.changeTempo((s) => s.incrementLarge());
  }

  decrementLarge() {
    this.changeTempo((s) => s.decrementLarge());
  }

  /** Records a tap and returns the new bpm, or null when the tempo was left alone. */
  onTapTempo(now?: number): number | null {
    const at = now ?? (this.options.now ? this.options.now() : performance.now());
    const bpm = this.tempoStore.getState().applyTap(at);
    if (bpm !== null) this.push({ tempo: this.getTempo() });
    return bpm;
  }

  // ---------- internals ----------

  private changeTempo(apply: (state: TempoState) => void) {
    const before = this.getTempo();
    apply(this.tempoStore.getState());
    if (this.getTempo() !== before) this.push({ tempo: this.getTempo() });
  }

  private resetPlaying() {
    this.fallback.stop();
    this.sessionStore.getState().setPlaying(false);
  }

  private deliver(tick: Tick, source: TickSource) {
    this.options.dispatch?.(tick.beatIndex);
    this.options.events?.onTick?.(tick, source);
  }

  private setConnection(state: ConnectionState) {
    this.sessionStore.getState().setConnection(state);
    this.options.events?.onConnectionChange?.(state);
  }

  private leaveConnected() {
    if (this.mode.kind !== "connected") return;
    this.mode.tickSub.remove();
    this.mode = { kind: "disconnected" };
  }

  private push(params: Partial<ExternalClockParams>) {
    if (this.mode.kind !== "connected") return;

    try {
      const result = this.mode.clock.update(params);
      if (result instanceof Promise) {
        void result.catch((error: unknown) => this.report("update failed", error));
      }
    } catch (error) {
      this.report("update failed", error);
    }
  }

  private report(what: string, error: unknown) {
    const details = `${what}: ${describeError(error)}`;
    this.logger.warn("[arbiter] ERROR:", details);
    this.options.events?.onError?.(details);
  }
}

export default TickArbiter;
