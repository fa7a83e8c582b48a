import { describe, it, expect } from "vitest";
import { findInputDevice, findOutputDevice, listDevices, listInputDevices, listOutputDevices } from "../directory";
import { VirtualPlatform } from "../../platform/virtual";
import type { MidiPlatform } from "../../platform/types";
import { TransportFailureError } from "../../errors";

function makePlatform(): VirtualPlatform {
  return new VirtualPlatform([
    { name: "USB MIDI Out", transmit: false },
    { name: "usb keyboard", receive: false },
    { name: "Loop A" },
    { name: "Loop B" },
  ]);
}

describe("routing/directory", () => {
  it("matches a case-sensitive substring combined with the direction", () => {
    const p = makePlatform();
    expect(findInputDevice(p, "USB")).toBeNull();
    expect(findInputDevice(p, "usb")?.name).toBe("usb keyboard");
    expect(findOutputDevice(p, "USB")?.name).toBe("USB MIDI Out");
    expect(findOutputDevice(p, "usb")).toBeNull();
  });

  it("returns the first match in enumeration order", () => {
    const p = makePlatform();
    expect(findInputDevice(p, "Loop")?.name).toBe("Loop A");
    expect(findOutputDevice(p, "Loop B")?.name).toBe("Loop B");
  });

  it("lists snapshots that do not follow later topology changes", () => {
    const p = makePlatform();
    const snapshot = listDevices(p);
    p.addDevice({ name: "Late" });
    expect(snapshot.length).toBe(4);
    expect(listDevices(p).length).toBe(5);
  });

  it("filters by capability", () => {
    const p = makePlatform();
    expect(listInputDevices(p).map((d) => d.name)).toEqual(["usb keyboard", "Loop A", "Loop B"]);
    expect(listOutputDevices(p).map((d) => d.name)).toEqual(["USB MIDI Out", "Loop A", "Loop B"]);
  });

  it("surfaces enumeration failures as TransportFailure", () => {
    const broken: MidiPlatform = { name: "broken", listDevices: () => { throw new Error("no backend"); } };
    expect(() => findInputDevice(broken, "x")).toThrow(TransportFailureError);
  });
});
