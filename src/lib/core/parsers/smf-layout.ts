/**
 * Standard MIDI File header and chunk table.
 *
 * Only chunk headers are read here; track data is left to the decoder so a
 * streamed load touches a few bytes per track.
 */

import { MidiLoadError } from "@/core/errors";
import type { ByteReader, ByteSource } from "./byte-source";

export interface SmfTrackChunk {
  index: number;
  /** Offset of the first data byte */
  start: number;
  /** Offset one past the last readable data byte */
  end: number;
  /** Length announced by the chunk header */
  declaredLength: number;
  /** True when the file ends before `start + declaredLength` */
  truncated: boolean;
}

export interface SmfTiming {
  /** Ticks per quarter note, or null for SMPTE timing */
  ticksPerQuarter: number | null;
  /** Ticks per second for SMPTE timing, otherwise null */
  ticksPerSecond: number | null;
}

export interface SmfLayout {
  format: 0 | 1 | 2;
  /** Raw division word from the header */
  division: number;
  timing: SmfTiming;
  /** Track count announced by the header */
  declaredTrackCount: number;
  tracks: SmfTrackChunk[];
}

const HEADER_ID = "MThd";
const TRACK_ID = "MTrk";

function readId(reader: ByteReader, offset: number): string {
  let id = "";
  for (let i = 0; i < 4; i++) {
    id += String.fromCharCode(Math.max(0, reader.byteAt(offset + i)));
  }
  return id;
}

function readUint16(reader: ByteReader, offset: number): number {
  return (reader.byteAt(offset) << 8) | reader.byteAt(offset + 1);
}

function readUint32(reader: ByteReader, offset: number): number {
  return (
    reader.byteAt(offset) * 0x1000000 +
    ((reader.byteAt(offset + 1) << 16) |
      (reader.byteAt(offset + 2) << 8) |
      reader.byteAt(offset + 3))
  );
}

function allZero(reader: ByteReader, from: number, to: number): boolean {
  for (let i = from; i < to; i++) {
    if (reader.byteAt(i) !== 0) return false;
  }
  return true;
}

function toFormat(value: number): SmfLayout["format"] | null {
  switch (value) {
    case 0:
    case 1:
    case 2:
      return value;
    default:
      return null;
  }
}

/**
 * Decode the division word into tick timing.
 */
export function decodeTiming(division: number): SmfTiming {
  if (division & 0x8000) {
    // SMPTE: high byte is a negative frame rate, low byte ticks per frame
    const framesPerSecond = 256 - ((division >> 8) & 0xff);
    const ticksPerFrame = division & 0xff;
    const fps = framesPerSecond === 29 ? 29.97 : framesPerSecond;
    return { ticksPerQuarter: null, ticksPerSecond: fps * ticksPerFrame };
  }
  return { ticksPerQuarter: division, ticksPerSecond: null };
}

/**
 * Read the MThd header and locate every MTrk chunk.
 *
 * @throws MidiLoadError when the header is missing or malformed, or when the
 *   file ends inside a chunk header
 */
export function readSmfLayout(source: ByteSource, path: string | null = null): SmfLayout {
  const reader = source.createReader();

  if (source.length < 14) {
    throw new MidiLoadError("File is too short to hold a MIDI header", path);
  }
  if (readId(reader, 0) !== HEADER_ID) {
    throw new MidiLoadError("Missing MThd header; not a Standard MIDI File", path);
  }

  const headerLength = readUint32(reader, 4);
  if (headerLength < 6) {
    throw new MidiLoadError(`MThd header length ${headerLength} is shorter than 6`, path);
  }

  const rawFormat = readUint16(reader, 8);
  const format = toFormat(rawFormat);
  if (format === null) {
    throw new MidiLoadError(`Unsupported MIDI format ${rawFormat}`, path);
  }
  const declaredTrackCount = readUint16(reader, 10);
  const division = readUint16(reader, 12);
  const timing = decodeTiming(division);
  if (timing.ticksPerQuarter === 0 || timing.ticksPerSecond === 0) {
    throw new MidiLoadError("MIDI header declares a zero time division", path);
  }

  const tracks: SmfTrackChunk[] = [];
  let pos = 8 + headerLength;
  while (pos < source.length) {
    const remaining = source.length - pos;
    if (remaining < 8) {
      // Zero padding after the last chunk is common and harmless
      if (allZero(reader, pos, source.length)) break;
      throw new MidiLoadError(`File truncated inside a chunk header at byte ${pos}`, path);
    }

    const id = readId(reader, pos);
    const declaredLength = readUint32(reader, pos + 4);
    const start = pos + 8;
    const declaredEnd = start + declaredLength;

    if (id === TRACK_ID) {
      tracks.push({
        index: tracks.length,
        start,
        end: Math.min(declaredEnd, source.length),
        declaredLength,
        truncated: declaredEnd > source.length,
      });
    }
    pos = declaredEnd;
  }

  if (tracks.length === 0) {
    throw new MidiLoadError("MIDI file contains no MTrk chunks", path);
  }
  if (tracks.length !== declaredTrackCount) {
    console.warn(
      `[SmfLayout] Header announces ${declaredTrackCount} tracks, found ${tracks.length}`
    );
  }

  return { format, division, timing, declaredTrackCount, tracks };
}
