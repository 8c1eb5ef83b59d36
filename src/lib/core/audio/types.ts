/**
 * Audio backend contracts shared by the dispatch layer and its backends.
 */

/** Outcome of handing one message to the audio dispatch. */
export type DispatchOutcome = "sent" | "suppressed" | "dropped";

/**
 * Real-time synthesizer with its own render timer and voice telemetry.
 */
export interface XSynthBackend {
  /**
   * Queue a packed short message for the next render pass.
   * @returns false when the handoff queue is full and the message was dropped
   */
  pushEvent(message: number): boolean;
  /** Silence every voice and discard queued messages. */
  reset(): void;
  /** Voices currently held (released tails are not counted). */
  getVoiceCount(): number;
  /** Per-key layer limit; null removes the limit. */
  setLayerCount(count: number | null): void;
  /** Swap the sample directory; an empty path selects the oscillator voice. */
  setSoundfont(path: string): void;
  /** Resolves once the audio context runs and samples are loaded. */
  ready(): Promise<void>;
  dispose(): void;
}

/**
 * Host-side MIDI output, e.g. a hardware port or another synth process.
 */
export interface MidiOutputPort {
  send(bytes: number[]): void;
  close?(): void;
}

/**
 * Backend that forwards messages to an external synthesizer unchanged.
 */
export interface PassThroughBackend {
  pushEvent(message: number): boolean;
  reset(): void;
  dispose(): void;
}

/**
 * The backend variant is fixed when the dispatch is built.
 */
export type AudioBackend =
  | { kind: "xsynth"; backend: XSynthBackend }
  | { kind: "kdmapi"; backend: PassThroughBackend };
