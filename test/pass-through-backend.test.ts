import { describe, it, expect } from "vitest";
import { MidiPortBackend } from "@/core/audio/backends/pass-through-backend";
import { createFakePort, msg } from "./utils/fake-audio";

describe("MidiPortBackend", () => {
  it("sends messages as wire bytes", () => {
    const port = createFakePort();
    const backend = new MidiPortBackend(port);

    expect(backend.pushEvent(msg(0x91, 60, 100))).toBe(true);
    backend.pushEvent(msg(0xc2, 5));

    expect(port.sent).toEqual([
      [0x91, 60, 100],
      [0xc2, 5],
    ]);
  });

  it("silences and resets every channel on reset", () => {
    const port = createFakePort();
    new MidiPortBackend(port).reset();

    expect(port.sent).toHaveLength(32);
    expect(port.sent[0]).toEqual([0xb0, 120, 0]);
    expect(port.sent[1]).toEqual([0xb0, 121, 0]);
    expect(port.sent[31]).toEqual([0xbf, 121, 0]);
  });

  it("resets and closes the port on dispose", () => {
    const port = createFakePort();
    const backend = new MidiPortBackend(port);
    backend.dispose();

    expect(port.sent).toHaveLength(32);
    expect(port.close).toHaveBeenCalledTimes(1);
    expect(backend.pushEvent(msg(0x90, 60, 100))).toBe(false);
    expect(port.sent).toHaveLength(32);
  });
});
