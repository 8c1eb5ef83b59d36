/**
 * Engine lifecycle
 * - `idle`: no file open
 * - `loaded-paused` / `loaded-playing`: a file is open
 * - `closed`: disposed, no further calls are accepted
 */
export type PlaybackState = "idle" | "loaded-paused" | "loaded-playing" | "closed";

/**
 * Counters shown next to the piano roll, refreshed every tick
 */
export interface PlaybackStats {
  /** Note-ons counted at load */
  totalNotes: number;
  /** Note-ons sent to the synth since the last reset */
  notesRendered: number;
  /** Voices held by the synth; always 0 on kdmapi */
  voiceCount: number;
  /** Messages the synth queue rejected since the dispatch was built */
  droppedEvents: number;
  /** Malformed events skipped by the decoder */
  skippedEvents: number;
  fps: number;
}
