// ---------------------------------------------------------------------------
// MIDI
// ---------------------------------------------------------------------------
/** Number of addressable keys (note numbers 0-127). */
export const MIDI_KEY_COUNT = 128;

/** Channels per MIDI port. */
export const MIDI_CHANNEL_COUNT = 16;

/**
 * Tempo assumed until the first Set Tempo meta event (120 BPM).
 */
export const DEFAULT_MICROSECONDS_PER_QUARTER = 500_000;

// ---------------------------------------------------------------------------
// Timeline
// ---------------------------------------------------------------------------
/** Events between two recorded decoder checkpoints. */
export const DEFAULT_CHECKPOINT_STRIDE = 4096;

/**
 * How far past the last pulled time the streamed timeline keeps decoded
 * events ready (seconds). Covers a 60fps frame with a wide margin.
 */
export const DEFAULT_LOOKAHEAD_SECONDS = 0.25;

/** Read window per track for file-backed byte sources (bytes). */
export const FILE_READ_WINDOW_BYTES = 64 * 1024;

// ---------------------------------------------------------------------------
// Playback / stats
// ---------------------------------------------------------------------------
/** Sliding window used by the FPS meter (seconds). */
export const FPS_WINDOW_SECONDS = 0.5;

/** Default arrow-key seek step (seconds). */
export const DEFAULT_SEEK_STEP_SECONDS = 1;

// ---------------------------------------------------------------------------
// Audio
// ---------------------------------------------------------------------------
/** Render window of the real-time synth (ms). */
export const DEFAULT_SYNTH_BUFFER_MS = 10;

/** Capacity of the engine → synth handoff queue (events). */
export const DEFAULT_QUEUE_CAPACITY = 65_536;

/** Default per-key layer limit when layer limiting is on. */
export const DEFAULT_LAYER_COUNT = 4;

/** Release applied to killed voices when fade-out-on-kill is enabled (s). */
export const KILL_FADE_SECONDS = 0.05;

/** Low-pass cutoff of the synth effects chain (Hz). */
export const EFFECTS_CUTOFF_HZ = 18_000;

/** Limiter threshold of the synth effects chain (dB). */
export const EFFECTS_LIMITER_DB = -1;

/**
 * Samples expected in a soundfont sample directory. Tone's Sampler
 * repitches the remaining notes from the nearest of these.
 */
export const DEFAULT_SAMPLE_MAP: Record<string, string> = {
  C3: "C3.mp3",
  "D#3": "Ds3.mp3",
  "F#3": "Fs3.mp3",
  A3: "A3.mp3",
  C4: "C4.mp3",
  "D#4": "Ds4.mp3",
  "F#4": "Fs4.mp3",
  A4: "A4.mp3",
};
