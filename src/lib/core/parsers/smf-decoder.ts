/**
 * SmfDecoder - incremental, merged-order decoder for Standard MIDI Files
 *
 * Walks every MTrk chunk in parallel and hands out channel-voice events in
 * non-decreasing absolute time (ties: lower track index first, then file
 * order within the track). Tempo meta events are folded into the time map;
 * other meta and SysEx events are skipped.
 *
 * The full decoder position is a plain `DecoderState` value, so callers can
 * snapshot it (checkpoints) and resume from it later. Both timeline variants
 * drive this class, which is what makes their output identical.
 */

import { DEFAULT_MICROSECONDS_PER_QUARTER } from "@/core/constants";
import { MidiDecodeError } from "@/core/errors";
import { dataLengthFor } from "@/core/midi/messages";
import type { MidiEvent } from "@/core/midi/types";
import type { ByteReader, ByteSource } from "./byte-source";
import type { SmfLayout, SmfTrackChunk } from "./smf-layout";

const META = 0xff;
const SYSEX = 0xf0;
const SYSEX_ESCAPE = 0xf7;
const META_END_OF_TRACK = 0x2f;
const META_SET_TEMPO = 0x51;

export interface TrackCursor {
  /** Offset of the pending event body (its delta time is already applied) */
  offset: number;
  /** Absolute tick of the pending event */
  tick: number;
  runningStatus: number;
  done: boolean;
}

export interface TempoState {
  /** Tick at which the current tempo took effect */
  tick: number;
  /** Seconds at that tick */
  seconds: number;
  microsecondsPerQuarter: number;
}

export interface DecoderState {
  tracks: TrackCursor[];
  tempo: TempoState;
  /** Channel events handed out so far */
  eventIndex: number;
  /** Time of the last channel event handed out (-Infinity before the first) */
  lastTime: number;
  /** Latest time reached by any event, meta events included */
  endTime: number;
}

export interface SmfDecoderOptions {
  /** Called for every malformed event that was skipped */
  onRecoverableError?: (error: MidiDecodeError) => void;
}

export function cloneDecoderState(state: DecoderState): DecoderState {
  return {
    tracks: state.tracks.map((cursor) => ({ ...cursor })),
    tempo: { ...state.tempo },
    eventIndex: state.eventIndex,
    lastTime: state.lastTime,
    endTime: state.endTime,
  };
}

export class SmfDecoder {
  private readonly readers: ByteReader[];
  private readonly initial: DecoderState;
  private state: DecoderState;

  /**
   * @throws MidiDecodeError (fatal) when a track cannot even yield its first
   *   delta time
   */
  constructor(
    source: ByteSource,
    private readonly layout: SmfLayout,
    private readonly options: SmfDecoderOptions = {}
  ) {
    this.readers = layout.tracks.map(() => source.createReader());
    this.state = {
      tracks: layout.tracks.map((chunk) => ({
        offset: chunk.start,
        tick: 0,
        runningStatus: 0,
        done: false,
      })),
      tempo: { tick: 0, seconds: 0, microsecondsPerQuarter: DEFAULT_MICROSECONDS_PER_QUARTER },
      eventIndex: 0,
      lastTime: Number.NEGATIVE_INFINITY,
      endTime: 0,
    };
    this.state.tracks.forEach((cursor, index) => this.readDelta(index, cursor));
    this.initial = cloneDecoderState(this.state);
  }

  get eventIndex(): number {
    return this.state.eventIndex;
  }

  get lastTime(): number {
    return this.state.lastTime;
  }

  get endTime(): number {
    return this.state.endTime;
  }

  get finished(): boolean {
    return this.state.tracks.every((cursor) => cursor.done);
  }

  /** Copy of the current position. */
  snapshot(): DecoderState {
    return cloneDecoderState(this.state);
  }

  /** Resume from a position previously returned by `snapshot()`. */
  restore(state: DecoderState): void {
    this.state = cloneDecoderState(state);
  }

  /** Go back to the beginning of the file. */
  rewind(): void {
    this.restore(this.initial);
  }

  /**
   * Next channel event in merged order, or null once every track has ended.
   *
   * @throws MidiDecodeError (fatal) on structural corruption
   */
  next(): MidiEvent | null {
    for (;;) {
      const index = this.pickTrack();
      if (index < 0) return null;

      const cursor = this.state.tracks[index];
      const event = this.readEvent(index, cursor);
      if (!cursor.done) {
        this.readDelta(index, cursor);
      }
      if (event) {
        this.state.eventIndex += 1;
        this.state.lastTime = event.time;
        return event;
      }
    }
  }

  /**
   * Convert an absolute tick to seconds with the tempo map decoded so far.
   * Valid for ticks at or after the current tempo's starting tick.
   */
  secondsAt(tick: number): number {
    const { ticksPerQuarter, ticksPerSecond } = this.layout.timing;
    if (ticksPerSecond !== null) {
      return tick / ticksPerSecond;
    }
    const tempo = this.state.tempo;
    // Single division keeps whole-number tick/tempo products exact
    return (
      tempo.seconds +
      ((tick - tempo.tick) * tempo.microsecondsPerQuarter) / ((ticksPerQuarter ?? 0) * 1_000_000)
    );
  }

  private pickTrack(): number {
    let best = -1;
    let bestTick = Number.POSITIVE_INFINITY;
    const tracks = this.state.tracks;
    for (let i = 0; i < tracks.length; i++) {
      const cursor = tracks[i];
      if (!cursor.done && cursor.tick < bestTick) {
        best = i;
        bestTick = cursor.tick;
      }
    }
    return best;
  }

  private chunk(index: number): SmfTrackChunk {
    return this.layout.tracks[index];
  }

  private byteAt(index: number, offset: number): number {
    const chunk = this.chunk(index);
    const value = offset < chunk.end ? this.readers[index].byteAt(offset) : -1;
    if (value < 0) {
      throw new MidiDecodeError(
        chunk.truncated
          ? "Unexpected end of stream before the announced track length"
          : "Event runs past the end of its track chunk",
        { fatal: true, track: index, offset }
      );
    }
    return value;
  }

  private readVlq(index: number, offset: number): { value: number; next: number } {
    let value = 0;
    for (let i = 0; i < 4; i++) {
      const byte = this.byteAt(index, offset + i);
      value = value * 128 + (byte & 0x7f);
      if ((byte & 0x80) === 0) {
        return { value, next: offset + i + 1 };
      }
    }
    throw new MidiDecodeError("Variable-length quantity longer than 4 bytes", {
      fatal: true,
      track: index,
      offset,
    });
  }

  private readDelta(index: number, cursor: TrackCursor): void {
    const chunk = this.chunk(index);
    if (cursor.offset >= chunk.end) {
      if (chunk.truncated) {
        throw new MidiDecodeError("Unexpected end of stream before the announced track length", {
          fatal: true,
          track: index,
          offset: cursor.offset,
        });
      }
      // Track without an End of Track event; treat the chunk end as one
      cursor.done = true;
      return;
    }
    const { value, next } = this.readVlq(index, cursor.offset);
    cursor.tick += value;
    cursor.offset = next;
  }

  private skip(index: number, offset: number, message: string): void {
    this.options.onRecoverableError?.(
      new MidiDecodeError(message, { fatal: false, track: index, offset })
    );
  }

  private touchEnd(tick: number): void {
    const time = this.secondsAt(tick);
    if (time > this.state.endTime) {
      this.state.endTime = time;
    }
  }

  private readEvent(index: number, cursor: TrackCursor): MidiEvent | null {
    const start = cursor.offset;
    let pos = start;
    const first = this.byteAt(index, pos);

    let status: number;
    if (first & 0x80) {
      status = first;
      pos += 1;
    } else if (cursor.runningStatus !== 0) {
      status = cursor.runningStatus;
    } else {
      cursor.offset = pos + 1;
      this.skip(index, start, "Data byte without a running status");
      return null;
    }

    if (status < 0xf0) {
      cursor.runningStatus = status;
      const length = dataLengthFor(status);
      const data1 = this.byteAt(index, pos);
      const data2 = length === 2 ? this.byteAt(index, pos + 1) : 0;
      cursor.offset = pos + length;
      this.touchEnd(cursor.tick);
      if ((data1 | data2) & 0x80) {
        this.skip(index, start, "Channel message carries a byte above 0x7F");
        return null;
      }
      return {
        time: this.secondsAt(cursor.tick),
        tick: cursor.tick,
        track: index,
        status,
        data1,
        data2,
      };
    }

    if (status === META) {
      const type = this.byteAt(index, pos);
      const { value: length, next } = this.readVlq(index, pos + 1);
      if (length > 0) {
        // Bounds check on the last payload byte
        this.byteAt(index, next + length - 1);
      }
      cursor.offset = next + length;
      this.touchEnd(cursor.tick);

      if (type === META_SET_TEMPO) {
        this.applyTempo(index, start, cursor.tick, next, length);
      } else if (type === META_END_OF_TRACK) {
        cursor.done = true;
      }
      return null;
    }

    if (status === SYSEX || status === SYSEX_ESCAPE) {
      const { value: length, next } = this.readVlq(index, pos);
      if (length > 0) {
        this.byteAt(index, next + length - 1);
      }
      cursor.offset = next + length;
      this.touchEnd(cursor.tick);
      return null;
    }

    // System common / real-time bytes have no place in a file
    cursor.offset = pos;
    this.skip(index, start, `Unexpected status byte 0x${status.toString(16)}`);
    return null;
  }

  private applyTempo(index: number, start: number, tick: number, dataOffset: number, length: number): void {
    if (length !== 3) {
      this.skip(index, start, `Set Tempo event with ${length} data bytes`);
      return;
    }
    const microsecondsPerQuarter =
      (this.byteAt(index, dataOffset) << 16) |
      (this.byteAt(index, dataOffset + 1) << 8) |
      this.byteAt(index, dataOffset + 2);
    if (microsecondsPerQuarter === 0) {
      this.skip(index, start, "Set Tempo event with zero tempo");
      return;
    }
    const seconds = this.secondsAt(tick);
    this.state.tempo = { tick, seconds, microsecondsPerQuarter };
  }
}
