import { describe, it, expect, vi } from "vitest";
import { MidiDecodeError } from "@/core/errors";
import type { MidiEvent } from "@/core/midi/types";
import { BufferByteSource } from "@/core/parsers/byte-source";
import { SmfDecoder } from "@/core/parsers/smf-decoder";
import { readSmfLayout } from "@/core/parsers/smf-layout";
import { catchError } from "./utils/catch-error";
import { buildSmf, ev, type RawSmfOptions, type RawTrack } from "./utils/mock-midi";

function decoderFor(tracks: RawTrack[], options: RawSmfOptions = {}, onRecoverableError = vi.fn()) {
  const source = new BufferByteSource(buildSmf(tracks, options));
  return new SmfDecoder(source, readSmfLayout(source), { onRecoverableError });
}

function drain(decoder: SmfDecoder): MidiEvent[] {
  const events: MidiEvent[] = [];
  for (let event = decoder.next(); event !== null; event = decoder.next()) {
    events.push(event);
  }
  return events;
}

describe("SmfDecoder", () => {
  it("places channel events on the absolute timeline", () => {
    const decoder = decoderFor([
      { events: [ev.tempo(0, 500000), ev.noteOn(0, 0, 60, 100), ev.noteOff(480, 0, 60), ev.endOfTrack()] },
    ]);

    expect(drain(decoder)).toEqual([
      { time: 0, tick: 0, track: 0, status: 0x90, data1: 60, data2: 100 },
      { time: 0.5, tick: 480, track: 0, status: 0x80, data1: 60, data2: 0 },
    ]);
    expect(decoder.finished).toBe(true);
    expect(decoder.eventIndex).toBe(2);
  });

  it("applies tempo changes from the tick they occur at", () => {
    const decoder = decoderFor([
      {
        events: [
          ev.noteOn(960, 0, 60, 100),
          ev.tempo(0, 1_000_000),
          ev.noteOn(480, 0, 62, 100),
          ev.endOfTrack(),
        ],
      },
    ]);

    expect(drain(decoder).map((e) => e.time)).toEqual([1, 2]);
  });

  it("merges tracks by time, lower track first on ties", () => {
    const decoder = decoderFor([
      { events: [ev.tempo(0, 500000), ev.noteOn(240, 0, 60, 100), ev.endOfTrack()] },
      { events: [ev.noteOn(0, 1, 64, 100), ev.noteOn(240, 1, 67, 100), ev.endOfTrack()] },
    ]);

    expect(drain(decoder).map((e) => [e.track, e.data1, e.time])).toEqual([
      [1, 64, 0],
      [0, 60, 0.25],
      [1, 67, 0.25],
    ]);
  });

  it("follows running status", () => {
    const decoder = decoderFor([
      { events: [ev.noteOn(0, 2, 60, 100), ev.running(0, 64, 90), ev.running(480, 60, 0), ev.endOfTrack()] },
    ]);

    expect(drain(decoder).map((e) => [e.status, e.data1, e.data2])).toEqual([
      [0x92, 60, 100],
      [0x92, 64, 90],
      [0x92, 60, 0],
    ]);
  });

  it("uses SMPTE time when the division asks for it", () => {
    const decoder = decoderFor([{ events: [ev.noteOn(500, 0, 60, 100), ev.endOfTrack()] }], { division: 0xe728 });

    expect(drain(decoder)[0].time).toBe(0.5);
  });

  it("skips malformed events and reports them as recoverable", () => {
    const onRecoverableError = vi.fn();
    const decoder = decoderFor(
      [
        {
          events: [
            [0x00, 0x40], // data byte with no running status yet
            ev.noteOn(0, 0, 60, 100),
            [0x00, 0xf8], // real-time status inside a file
            ev.noteOff(480, 0, 60),
            ev.endOfTrack(),
          ],
        },
      ],
      {},
      onRecoverableError
    );

    expect(drain(decoder).map((e) => e.status)).toEqual([0x90, 0x80]);
    expect(onRecoverableError).toHaveBeenCalledTimes(2);
    expect(onRecoverableError.mock.calls[0][0]).toBeInstanceOf(MidiDecodeError);
    expect(onRecoverableError.mock.calls[0][0]).toMatchObject({
      fatal: false,
      message: "Data byte without a running status (track 0, byte 23)",
    });
    expect(onRecoverableError.mock.calls[1][0]).toMatchObject({
      message: "Unexpected status byte 0xf8 (track 0, byte 29)",
    });
  });

  it("fails fatally when a track ends before its announced length", () => {
    const decoder = decoderFor([
      { events: [ev.noteOn(0, 0, 60, 100), ev.noteOff(480, 0, 60)], declaredLength: 30 },
    ]);

    expect(decoder.next()?.data1).toBe(60);
    const error = catchError(() => decoder.next());
    expect(error).toBeInstanceOf(MidiDecodeError);
    expect(error).toMatchObject({
      fatal: true,
      track: 0,
      offset: 31,
      message: "Unexpected end of stream before the announced track length (track 0, byte 31)",
    });
  });

  it("resumes from a snapshot", () => {
    const decoder = decoderFor([
      { events: [ev.noteOn(0, 0, 60, 100), ev.noteOn(480, 0, 62, 100), ev.noteOn(480, 0, 64, 100), ev.endOfTrack()] },
    ]);

    decoder.next();
    const snapshot = decoder.snapshot();
    const rest = drain(decoder);

    decoder.restore(snapshot);
    expect(decoder.eventIndex).toBe(1);
    expect(drain(decoder)).toEqual(rest);

    decoder.rewind();
    expect(drain(decoder).map((e) => e.data1)).toEqual([60, 62, 64]);
  });

  it("measures the length up to the last event of any kind", () => {
    const decoder = decoderFor([
      { events: [ev.noteOn(0, 0, 60, 100), ev.noteOff(480, 0, 60), ev.text(480, "fin"), ev.endOfTrack(960)] },
    ]);

    drain(decoder);
    expect(decoder.endTime).toBe(2);
  });
});
