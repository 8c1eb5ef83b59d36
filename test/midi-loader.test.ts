import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";
import { MidiLoadError } from "@/core/errors";
import { loadMidiBuffer, loadMidiFile } from "@/core/file/loader";
import { buildSmf, createMockMidi, ev } from "./utils/mock-midi";

let dir = "";

function writeMidi(name: string, bytes: Uint8Array): string {
  const path = join(dir, name);
  writeFileSync(path, bytes);
  return path;
}

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), "keyroll-loader-"));
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

const SONG = createMockMidi(
  [
    {
      name: "Lead",
      channel: 0,
      notes: [
        { midi: 60, ticks: 960, durationTicks: 960 },
        { midi: 64, ticks: 960, durationTicks: 480, velocity: 0.5 },
      ],
    },
  ],
  "Demo Song"
);

describe("loadMidiFile", () => {
  it("decodes into memory by default", async () => {
    const path = writeMidi("song.mid", SONG);
    const loaded = await loadMidiFile(path);

    expect(loaded.timeline.kind).toBe("buffered");
    expect(loaded.totalNotes).toBe(2);
    expect(loaded.length).toBe(2);
    expect(loaded.info).toEqual({
      path,
      format: 1,
      division: 480,
      trackCount: 2,
      title: "Demo Song",
      trackNames: ["Demo Song", "Lead"],
      instruments: [null, "acoustic grand piano"],
    });
  });

  it("streams from disk in live mode", async () => {
    const path = writeMidi("live.mid", SONG);
    const loaded = await loadMidiFile(path, { loading: "live" });

    expect(loaded.timeline.kind).toBe("streamed");
    expect(loaded.totalNotes).toBe(2);
    expect(loaded.length).toBe(2);
    expect(loaded.info.title).toBeNull();
    expect(loaded.info.trackCount).toBe(2);
    loaded.timeline.close();
  });

  it("leaves ignored velocities out of the note count", async () => {
    const path = writeMidi("velocity.mid", SONG);

    const ram = await loadMidiFile(path, { velIgnore: { lo: 1, hi: 64 } });
    const live = await loadMidiFile(path, { loading: "live", velIgnore: { lo: 1, hi: 64 } });
    live.timeline.close();

    expect(ram.totalNotes).toBe(1);
    expect(live.totalNotes).toBe(1);
  });

  it("reports unreadable paths as load errors", async () => {
    const path = join(dir, "missing.mid");

    await expect(loadMidiFile(path)).rejects.toBeInstanceOf(MidiLoadError);
    await expect(loadMidiFile(path, { loading: "live" })).rejects.toMatchObject({
      message: `Cannot open ${path}`,
      path,
    });
  });

  it("reports files that are not MIDI as load errors", async () => {
    const path = writeMidi("notes.txt", Uint8Array.from("just some text here", (c) => c.charCodeAt(0)));

    await expect(loadMidiFile(path)).rejects.toMatchObject({
      message: "Missing MThd header; not a Standard MIDI File",
      path,
    });
  });

  it("fails a RAM load of a truncated file but streams it up to the damage", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const path = writeMidi(
      "truncated.mid",
      buildSmf([{ events: [ev.noteOn(0, 0, 60, 100), ev.noteOff(480, 0, 60)], declaredLength: 40 }])
    );

    await expect(loadMidiFile(path)).rejects.toBeInstanceOf(MidiLoadError);

    const live = await loadMidiFile(path, { loading: "live" });
    expect(live.totalNotes).toBe(1);
    expect(live.length).toBeNull();
    live.timeline.close();
    vi.restoreAllMocks();
  });
});

describe("loadMidiBuffer", () => {
  it("names every track chunk when the first one carries notes", () => {
    const bytes = buildSmf([
      {
        events: [ev.trackName(0, "Piano"), ev.noteOn(0, 0, 60, 100), ev.noteOff(480, 0, 60), ev.endOfTrack()],
      },
      {
        events: [ev.trackName(0, "Bass"), ev.noteOn(0, 1, 36, 100), ev.noteOff(480, 1, 36), ev.endOfTrack()],
      },
    ]);
    const { info } = loadMidiBuffer(bytes);

    expect(info.trackCount).toBe(2);
    expect(info.trackNames).toEqual(["Piano", "Bass"]);
    expect(info.instruments).toEqual(["acoustic grand piano", "acoustic grand piano"]);
  });

  it("counts skipped events on the timeline", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const bytes = buildSmf([
      { events: [ev.noteOn(0, 0, 60, 100), [0x00, 0xf8], ev.noteOff(480, 0, 60), ev.endOfTrack()] },
    ]);

    expect(loadMidiBuffer(bytes).timeline.skippedEvents).toBe(1);
    vi.restoreAllMocks();
  });

  it("logs a summary in debug mode", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    loadMidiBuffer(SONG, { debug: true });

    expect(log).toHaveBeenCalledWith("[loadMidiFile] Loaded buffer", {
      mode: "buffered",
      tracks: 2,
      notes: 2,
      length: 2,
    });
    log.mockRestore();
  });
});
