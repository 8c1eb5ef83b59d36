import type { VelocityRange } from "@/core/midi/types";

export type SynthKind = "xsynth" | "kdmapi";

/**
 * How a MIDI file is brought into the player
 * - `ram`: decode everything at load time
 * - `live`: decode from disk while playing
 */
export type MidiLoading = "ram" | "live";

/**
 * Synthesizer settings, applied when the audio dispatch is built
 */
export interface SynthSettings {
  synth: SynthKind;
  /** Render window of the real-time synth in milliseconds */
  bufferMs: number;
  /** Sample directory for the synth; empty selects the built-in oscillator voice */
  soundfontPath: string;
  limitLayers: boolean;
  /** Voices allowed per key and channel when `limitLayers` is on */
  layerCount: number;
  /** Note-on velocities in this inclusive range are not sent to the synth */
  velIgnore: VelocityRange;
  /** Fade killed voices out instead of cutting them */
  fadeOutKill: boolean;
  /** Linear instead of exponential release envelope */
  linearEnvelope: boolean;
  /** Low-pass and limiter on the synth output */
  useEffects: boolean;
  /** Capacity of the handoff queue between engine and synth */
  queueCapacity: number;
}

export interface KeyRange {
  first: number;
  last: number;
}

export interface MidiSettings {
  loading: MidiLoading;
  /** Give every channel a random color instead of the palette color */
  randomColors: boolean;
  /** Id of the channel palette (see `DEFAULT_PALETTES`) */
  palette: string;
  /** Keys shown on the on-screen keyboard */
  keyRange: KeyRange;
  /** Events between streamed-timeline checkpoints */
  checkpointStride: number;
  /** Seconds decoded ahead of the playhead by the streamed timeline */
  lookaheadSeconds: number;
  /** Step used by `seekBy` shortcuts, in seconds */
  seekStep: number;
}

export interface PlayerSettings {
  synth: SynthSettings;
  midi: MidiSettings;
  /** Log lifecycle messages */
  debug: boolean;
}

/**
 * Partial settings as supplied by configuration files or command lines.
 */
export interface PlayerSettingsInput {
  synth?: Partial<SynthSettings>;
  midi?: Partial<MidiSettings>;
  debug?: boolean;
}
