/**
 * Playback module exports
 */

export {
  PlaybackEngine,
  createPlaybackEngine,
  type PlaybackEngineConfig,
} from "./playback-engine";
export { PlaybackClock, performanceTimeSource, type TimeSource } from "./playback-clock";
export { NoteColorState } from "./note-color-state";
export { FrameRateMeter } from "./frame-rate-meter";
export type { PlaybackState, PlaybackStats } from "./types";
