import { MIDI_KEY_COUNT } from "@/core/constants";
import type { NoteColor } from "@/core/midi/types";

/**
 * Which keys are sounding and in which color.
 *
 * A key stays lit while any note on it is active; the color is the one of
 * the most recent note-on.
 */
export class NoteColorState {
  private readonly active = new Uint16Array(MIDI_KEY_COUNT);
  private readonly colors: Array<NoteColor | null> = new Array(MIDI_KEY_COUNT).fill(null);

  noteOn(key: number, color: NoteColor): void {
    if (key < 0 || key >= MIDI_KEY_COUNT) return;
    this.active[key] += 1;
    this.colors[key] = color;
  }

  noteOff(key: number): void {
    if (key < 0 || key >= MIDI_KEY_COUNT) return;
    // Note-off without a matching note-on
    if (this.active[key] === 0) return;
    this.active[key] -= 1;
    if (this.active[key] === 0) {
      this.colors[key] = null;
    }
  }

  activeCount(key: number): number {
    return this.active[key] ?? 0;
  }

  get(key: number): NoteColor | null {
    return this.colors[key] ?? null;
  }

  /** Colors of keys `first..last` inclusive. */
  slice(first: number, last: number): Array<NoteColor | null> {
    return this.colors.slice(first, last + 1);
  }

  snapshot(): Array<NoteColor | null> {
    return this.colors.slice();
  }

  clear(): void {
    this.active.fill(0);
    this.colors.fill(null);
  }
}
