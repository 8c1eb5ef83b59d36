// Public API

// 1) Loading
export { loadMidiBuffer, loadMidiFile, readMidiInfo } from "./lib/core/file";
export type { LoadedMidi, MidiFileInfo, MidiLoadOptions } from "./lib/core/file";

// 2) Playback engine
export {
  PlaybackEngine,
  createPlaybackEngine,
  PlaybackClock,
  NoteColorState,
  FrameRateMeter,
  performanceTimeSource,
} from "./lib/core/playback";
export type {
  PlaybackEngineConfig,
  PlaybackState,
  PlaybackStats,
  TimeSource,
} from "./lib/core/playback";

// 3) Timelines
export {
  BufferedTimeline,
  StreamedTimeline,
  CheckpointIndex,
  readRange,
} from "./lib/core/timeline";
export type { EventTimeline, TimelineKind, StreamedTimelineOptions } from "./lib/core/timeline";

// 4) Audio
export {
  AudioDispatch,
  createAudioDispatch,
  BoundedEventQueue,
  MidiPortBackend,
  ToneSynthBackend,
} from "./lib/core/audio";
export type {
  AudioBackend,
  AudioDispatchEnvironment,
  DispatchOutcome,
  MidiOutputPort,
  PassThroughBackend,
  ToneSynthConfig,
  XSynthBackend,
} from "./lib/core/audio";

// 5) Settings
export {
  DEFAULT_PLAYER_SETTINGS,
  resolvePlayerSettings,
  midiLoadOptionsFrom,
  engineConfigFrom,
} from "./lib/core/settings";
export type {
  KeyRange,
  MidiLoading,
  MidiSettings,
  PlayerSettings,
  PlayerSettingsInput,
  SynthKind,
  SynthSettings,
} from "./lib/core/settings";

// 6) MIDI helpers
export type { ColorPalette, MidiEvent, NoteColor, VelocityRange } from "./lib/core/midi/types";
export { DEFAULT_PALETTES } from "./lib/core/midi/palette";
export { ChannelColorPolicy } from "./lib/core/midi/color-policy";
export { packMessage } from "./lib/core/midi/messages";
export { formatClock, formatProgressLabel } from "./lib/core/utils";

// 7) Errors
export { AudioBackendError, MidiDecodeError, MidiLoadError, SettingsError } from "./lib/core/errors";
