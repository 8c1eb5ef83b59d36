import { describe, it, expect, vi, afterEach } from "vitest";
import { MidiDecodeError } from "@/core/errors";
import type { MidiEvent } from "@/core/midi/types";
import { BufferByteSource } from "@/core/parsers/byte-source";
import { readSmfLayout } from "@/core/parsers/smf-layout";
import { CheckpointIndex } from "@/core/timeline/checkpoint-index";
import { decodeAllEvents, scanStream } from "@/core/timeline/decode";
import { StreamedTimeline, type StreamedTimelineOptions } from "@/core/timeline/streamed-timeline";
import { catchError } from "./utils/catch-error";
import { buildSmf, ev } from "./utils/mock-midi";

/** 64 note-ons, one every 240 ticks (0.25 s), keys 40..103 */
function scaleFile(): Uint8Array {
  const events = [ev.tempo(0, 500000)];
  for (let i = 0; i < 64; i++) {
    events.push(ev.noteOn(i === 0 ? 0 : 240, 0, 40 + i, 100));
  }
  events.push(ev.endOfTrack());
  return buildSmf([{ events }]);
}

function open(bytes: Uint8Array, options: StreamedTimelineOptions = {}) {
  const source = new BufferByteSource(bytes);
  const layout = readSmfLayout(source);
  return { source, layout, timeline: new StreamedTimeline(source, layout, options) };
}

function pull(timeline: StreamedTimeline, end: number): number[] {
  const keys: number[] = [];
  timeline.pullUntil(end, (e: MidiEvent) => keys.push(e.data1));
  return keys;
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("StreamedTimeline", () => {
  it("decodes only a lookahead window past the pulled time", () => {
    const { timeline } = open(scaleFile(), { lookaheadSeconds: 0.5 });

    expect(pull(timeline, 0.5)).toEqual([40, 41, 42]);
    // Buffer runs up to the first event past 0.5 + 0.5
    expect(timeline.bufferedCount).toBe(3);
    expect(timeline.cursorIndex).toBe(3);
    expect(timeline.nextEventTime()).toBe(0.75);
  });

  it("serves forward seeks in place", () => {
    const { timeline } = open(scaleFile());
    pull(timeline, 1);

    timeline.seek(2);
    expect(timeline.cursorIndex).toBe(8);
    expect(pull(timeline, 2.25)).toEqual([48, 49]);
  });

  it("restarts from the nearest checkpoint on a backward seek", () => {
    const checkpoints = new CheckpointIndex(8);
    const { timeline } = open(scaleFile(), { checkpoints });
    pull(timeline, 100);
    // Every 8th event plus the end of the stream
    expect(checkpoints.size).toBe(9);

    timeline.seek(5);
    expect(timeline.cursorIndex).toBe(20);
    expect(pull(timeline, 5.5)).toEqual([60, 61, 62]);
  });

  it("rewinds to the start when no checkpoint precedes the target", () => {
    const { timeline } = open(scaleFile(), { checkpoints: new CheckpointIndex(1000) });
    pull(timeline, 3);

    timeline.seek(0);
    expect(timeline.cursorIndex).toBe(0);
    expect(pull(timeline, 0.25)).toEqual([40, 41]);
  });

  it("seeking to the same time twice yields no duplicates", () => {
    const { timeline } = open(scaleFile());
    pull(timeline, 4);

    timeline.seek(1);
    timeline.seek(1);
    expect(pull(timeline, 1.5)).toEqual([44, 45, 46]);
  });

  it("counts a malformed event once even when it is decoded again", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const bytes = buildSmf([
      { events: [ev.noteOn(0, 0, 60, 100), [0x00, 0xf8], ev.noteOff(480, 0, 60), ev.endOfTrack()] },
    ]);
    const { timeline } = open(bytes);

    expect(pull(timeline, 1)).toEqual([60, 60]);
    timeline.seek(0);
    pull(timeline, 1);
    expect(timeline.skippedEvents).toBe(1);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("throws a fatal error where the stream ends early", () => {
    const bytes = buildSmf([
      { events: [ev.noteOn(0, 0, 60, 100), ev.noteOff(480, 0, 60)], declaredLength: 40 },
    ]);
    const { timeline } = open(bytes);
    const keys: number[] = [];

    const error = catchError(() => timeline.pullUntil(0, (e) => keys.push(e.data1)));
    expect(keys).toEqual([60]);
    expect(error).toBeInstanceOf(MidiDecodeError);
    expect(error).toMatchObject({ fatal: true });
  });

  it("closes its source", () => {
    const { source, timeline } = open(scaleFile());
    const close = vi.spyOn(source, "close");
    timeline.close();

    expect(close).toHaveBeenCalledTimes(1);
    expect(timeline.nextEventTime()).toBeNull();
  });
});

describe("scanStream", () => {
  it("counts notes, measures length and records checkpoints", () => {
    const source = new BufferByteSource(scaleFile());
    const layout = readSmfLayout(source);
    const checkpoints = new CheckpointIndex(16);

    const scan = scanStream(source, layout, checkpoints, (e) => e.data1 % 2 === 0);

    expect(scan).toEqual({ totalNotes: 32, length: 15.75, skippedEvents: 0, error: null });
    expect(checkpoints.size).toBe(5);
    expect(checkpoints.lastEventIndex).toBe(64);
  });

  it("stops at a fatal error instead of throwing", () => {
    const bytes = buildSmf([
      { events: [ev.noteOn(0, 0, 60, 100), ev.noteOff(480, 0, 60)], declaredLength: 40 },
    ]);
    const source = new BufferByteSource(bytes);
    const scan = scanStream(source, readSmfLayout(source), new CheckpointIndex(), () => true);

    expect(scan.totalNotes).toBe(1);
    expect(scan.length).toBeNull();
    expect(scan.error).toBeInstanceOf(MidiDecodeError);
  });
});

describe("decodeAllEvents", () => {
  it("throws on a stream that ends early", () => {
    const bytes = buildSmf([{ events: [ev.noteOn(0, 0, 60, 100)], declaredLength: 12 }]);
    const source = new BufferByteSource(bytes);

    expect(() => decodeAllEvents(source, readSmfLayout(source))).toThrow(MidiDecodeError);
  });
});

describe("CheckpointIndex", () => {
  it("rejects a non-positive stride", () => {
    expect(() => new CheckpointIndex(0)).toThrow(RangeError);
  });

  it("returns null before any checkpoint is recorded", () => {
    expect(new CheckpointIndex().before(10)).toBeNull();
  });
});
