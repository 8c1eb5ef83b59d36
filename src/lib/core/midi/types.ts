/**
 * One channel-voice message placed on the absolute timeline.
 *
 * Events are owned by the timeline that produced them; consumers only read
 * them for the duration of a dispatch call.
 */
export interface MidiEvent {
  /** Absolute time in seconds */
  time: number;
  /** Absolute time in ticks */
  tick: number;
  /** Index of the MTrk chunk the event came from */
  track: number;
  /** Status byte (0x80-0xEF) */
  status: number;
  /** First data byte (0 when the message has none) */
  data1: number;
  /** Second data byte (0 for one-byte messages) */
  data2: number;
}

/**
 * Key highlight color as 0xRRGGBB.
 */
export type NoteColor = number;

/**
 * Color palette used for channel highlighting
 */
export interface ColorPalette {
  id: string;
  name: string;
  colors: NoteColor[];
}

/**
 * Inclusive velocity range, e.g. `{ lo: 1, hi: 10 }`.
 */
export interface VelocityRange {
  lo: number;
  hi: number;
}
