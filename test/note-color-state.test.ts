import { describe, it, expect } from "vitest";
import { NoteColorState } from "@/core/playback/note-color-state";

describe("NoteColorState", () => {
  it("lights a key with the latest note-on color", () => {
    const state = new NoteColorState();
    state.noteOn(60, 0x112233);
    state.noteOn(60, 0x445566);

    expect(state.get(60)).toBe(0x445566);
    expect(state.activeCount(60)).toBe(2);
  });

  it("keeps a key lit until every overlapping note has ended", () => {
    const state = new NoteColorState();
    state.noteOn(60, 0x112233);
    state.noteOn(60, 0x445566);
    state.noteOff(60);

    expect(state.get(60)).toBe(0x445566);

    state.noteOff(60);
    expect(state.get(60)).toBeNull();
    expect(state.activeCount(60)).toBe(0);
  });

  it("ignores unmatched note-offs", () => {
    const state = new NoteColorState();
    state.noteOff(60);
    state.noteOn(60, 0x112233);

    expect(state.activeCount(60)).toBe(1);
    expect(state.get(60)).toBe(0x112233);
  });

  it("ignores keys outside 0..127", () => {
    const state = new NoteColorState();
    state.noteOn(128, 0x112233);
    state.noteOn(-1, 0x112233);

    expect(state.snapshot().every((color) => color === null)).toBe(true);
  });

  it("slices an inclusive key range", () => {
    const state = new NoteColorState();
    state.noteOn(21, 0xaa0000);
    state.noteOn(23, 0x00aa00);

    expect(state.slice(21, 23)).toEqual([0xaa0000, null, 0x00aa00]);
    expect(state.slice(0, 127)).toHaveLength(128);
  });

  it("clears every key", () => {
    const state = new NoteColorState();
    state.noteOn(60, 0x112233);
    state.clear();

    expect(state.get(60)).toBeNull();
    expect(state.activeCount(60)).toBe(0);
  });
});
