import type { VelocityRange } from "@/core/midi/types";
import type { MidiLoading } from "@/core/settings";
import type { EventTimeline } from "@/core/timeline";

/**
 * Options for loading a MIDI file
 */
export interface MidiLoadOptions {
  /** `ram` decodes everything up front, `live` streams from the source */
  loading?: MidiLoading;
  /**
   * Note-ons in this range are left out of `totalNotes`. Must match the
   * range the audio dispatch suppresses, or `notesRendered` will not reach
   * `totalNotes`; `midiLoadOptionsFrom(settings)` keeps the two in step.
   */
  velIgnore?: VelocityRange | null;
  /** Events between checkpoints of a streamed timeline */
  checkpointStride?: number;
  /** Lookahead of a streamed timeline in seconds */
  lookaheadSeconds?: number;
  debug?: boolean;
}

/**
 * Header facts plus, when the whole file was read, its track metadata
 */
export interface MidiFileInfo {
  path: string | null;
  format: 0 | 1 | 2;
  /** Raw division word */
  division: number;
  trackCount: number;
  title: string | null;
  /** One name per MTrk chunk, indexed like `MidiEvent.track` */
  trackNames: string[];
  /** General MIDI instrument per MTrk chunk; null for chunks without notes */
  instruments: Array<string | null>;
}

/**
 * A file ready to be handed to the playback engine
 */
export interface LoadedMidi {
  timeline: EventTimeline;
  /** Note-ons counted at load time */
  totalNotes: number;
  /** Length in seconds; null when a streamed file is damaged before its end */
  length: number | null;
  info: MidiFileInfo;
}
