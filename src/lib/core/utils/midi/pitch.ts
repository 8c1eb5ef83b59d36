const NOTE_NAMES = ["C", "C#", "D", "D#", "E", "F", "F#", "G", "G#", "A", "A#", "B"] as const;

/**
 * Converts MIDI note number to scientific pitch notation
 * @param midi - MIDI note number (0-127, where 60 = C4)
 * @returns Scientific pitch notation (e.g., "C4", "A#3")
 *
 * @example
 * ```typescript
 * midiToNoteName(60); // "C4"
 * midiToNoteName(69); // "A4"
 * midiToNoteName(61); // "C#4"
 * ```
 */
export function midiToNoteName(midi: number): string {
  if (!Number.isInteger(midi) || midi < 0 || midi > 127) {
    throw new Error(`MIDI note number must be between 0 and 127, got ${midi}`);
  }

  const octave = Math.floor(midi / 12) - 1;
  return `${NOTE_NAMES[midi % 12]}${octave}`;
}
