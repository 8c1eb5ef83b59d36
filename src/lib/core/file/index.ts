export { loadMidiBuffer, loadMidiFile } from "./loader";
export { readMidiInfo } from "./metadata";
export type { LoadedMidi, MidiFileInfo, MidiLoadOptions } from "./types";
