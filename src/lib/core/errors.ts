/**
 * Error types surfaced by the playback core.
 *
 * Load and fatal decode errors propagate to the caller; everything else is
 * absorbed and only shows up in counters.
 */

/**
 * The file could not be opened or its header/chunk structure is unusable.
 * No timeline is created.
 */
export class MidiLoadError extends Error {
  readonly path: string | null;

  constructor(message: string, path: string | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MidiLoadError";
    this.path = path;
  }
}

/**
 * A problem met while decoding track data.
 *
 * `fatal: false` means a single event was skipped and decoding continued;
 * `fatal: true` means the stream cannot be decoded any further.
 */
export class MidiDecodeError extends Error {
  readonly fatal: boolean;
  readonly track: number;
  readonly offset: number;

  constructor(message: string, details: { fatal: boolean; track: number; offset: number }) {
    super(`${message} (track ${details.track}, byte ${details.offset})`);
    this.name = "MidiDecodeError";
    this.fatal = details.fatal;
    this.track = details.track;
    this.offset = details.offset;
  }
}

/** A settings value is outside its accepted range. */
export class SettingsError extends RangeError {
  readonly key: string;

  constructor(key: string, message: string) {
    super(`${key}: ${message}`);
    this.name = "SettingsError";
    this.key = key;
  }
}

/** The selected synthesizer backend could not be created. */
export class AudioBackendError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AudioBackendError";
  }
}
