export type TempoBounds = {
  min: number;
  max: number;
  default: number;
};

export type Tempo = Readonly<{
  bpm: number;
}>;

/**
 * Beat layout contract
 * - beats: pulses per measure (1..8)
 * - subdivisions: clicks per pulse (1..4)
 * - gaps: muted beat positions, 1-based, sorted
 */
export type BeatLayout = Readonly<{
  beats: number;
  subdivisions: number;
  gaps: readonly number[];
  emphasizeFirstBeat: boolean;
  sound: boolean;
}>;

export type ConnectionState = "disconnected" | "connected";

export type TickSource = "external" | "fallback";

export type Tick = {
  beatIndex: number;
};
