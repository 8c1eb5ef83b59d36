import type { MidiEvent } from "./types";

export const NOTE_OFF = 0x80;
export const NOTE_ON = 0x90;
export const POLY_AFTERTOUCH = 0xa0;
export const CONTROL_CHANGE = 0xb0;
export const PROGRAM_CHANGE = 0xc0;
export const CHANNEL_PRESSURE = 0xd0;
export const PITCH_BEND = 0xe0;

export const CC_ALL_SOUND_OFF = 120;
export const CC_RESET_ALL_CONTROLLERS = 121;
export const CC_ALL_NOTES_OFF = 123;

/** High nibble of a status byte. */
export function commandOf(status: number): number {
  return status & 0xf0;
}

/** Low nibble of a status byte. */
export function channelOf(status: number): number {
  return status & 0x0f;
}

/**
 * Number of data bytes that follow a channel-voice status byte.
 */
export function dataLengthFor(status: number): 1 | 2 {
  const command = commandOf(status);
  return command === PROGRAM_CHANGE || command === CHANNEL_PRESSURE ? 1 : 2;
}

/**
 * Pack a channel message into the 32-bit short-message layout used by synth
 * backends: status in the low byte, then data1, then data2.
 */
export function packMessage(event: Pick<MidiEvent, "status" | "data1" | "data2">): number {
  return (event.status & 0xff) | ((event.data1 & 0x7f) << 8) | ((event.data2 & 0x7f) << 16);
}

export function messageStatus(message: number): number {
  return message & 0xff;
}

export function messageData1(message: number): number {
  return (message >>> 8) & 0x7f;
}

export function messageData2(message: number): number {
  return (message >>> 16) & 0x7f;
}

/**
 * Serialise a packed message back into wire bytes (2 or 3 bytes).
 */
export function messageBytes(message: number): number[] {
  const status = messageStatus(message);
  if (dataLengthFor(status) === 1) {
    return [status, messageData1(message)];
  }
  return [status, messageData1(message), messageData2(message)];
}

/** Note-on with a non-zero velocity. */
export function isNoteOnMessage(message: number): boolean {
  return commandOf(messageStatus(message)) === NOTE_ON && messageData2(message) > 0;
}

/** Note-off, or the note-on-with-velocity-0 shorthand. */
export function isNoteOffMessage(message: number): boolean {
  const command = commandOf(messageStatus(message));
  return command === NOTE_OFF || (command === NOTE_ON && messageData2(message) === 0);
}

export function isNoteOn(event: MidiEvent): boolean {
  return commandOf(event.status) === NOTE_ON && event.data2 > 0;
}

export function isNoteOff(event: MidiEvent): boolean {
  const command = commandOf(event.status);
  return command === NOTE_OFF || (command === NOTE_ON && event.data2 === 0);
}
