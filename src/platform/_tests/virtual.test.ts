import { describe, it, expect } from "vitest";
import { VirtualPlatform } from "../virtual";
import { ShortMessage } from "../../midi/messages";
import type { NativeMidiMessage } from "../../midi/messages";
import type { Receiver } from "../types";

function recorder(): Receiver & { got: Array<{ bytes: number[]; ts: number }> } {
  const got: Array<{ bytes: number[]; ts: number }> = [];
  return {
    kind: "receiver",
    name: "rec",
    got,
    send: (m: NativeMidiMessage, ts: number) => { got.push({ bytes: m.getMessage(), ts }); },
    close: () => { /* no-op */ },
  };
}

describe("platform/VirtualPlatform", () => {
  it("lists devices in declaration order and reports capabilities", () => {
    const p = new VirtualPlatform([
      { name: "Keys", receive: false },
      { name: "Synth", transmit: false },
    ]);
    const devices = p.listDevices();
    expect(devices.map((d) => d.name)).toEqual(["Keys", "Synth"]);
    expect(devices[0].maxTransmitters).toBe(-1);
    expect(devices[0].maxReceivers).toBe(0);
    expect(devices[1].maxTransmitters).toBe(0);
    expect(() => devices[1].getTransmitter()).toThrow(/pas d'émetteur/);
  });

  it("inject emits on every open transmitter", () => {
    const p = new VirtualPlatform();
    const dev = p.addDevice({ name: "Pads" });
    const t = dev.getTransmitter();
    const rec = recorder();
    t.setReceiver(rec);
    dev.inject([0x99, 36, 100], 2500);
    expect(rec.got).toEqual([{ bytes: [0x99, 36, 100], ts: 2500 }]);
  });

  it("closed transmitters stop emitting and leave the open list", () => {
    const dev = new VirtualPlatform().addDevice({ name: "Pads" });
    const t = dev.getTransmitter();
    const rec = recorder();
    t.setReceiver(rec);
    t.close();
    t.close();
    dev.inject([0x90, 1, 1]);
    expect(rec.got).toEqual([]);
    expect(dev.transmitters()).toEqual([]);
  });

  it("receivers record deliveries and throw once closed", () => {
    const dev = new VirtualPlatform().addDevice({ name: "Synth" });
    const r = dev.getReceiver();
    r.send(new ShortMessage(0xb0, 7, 90), -1);
    expect(dev.received).toEqual([{ bytes: [0xb0, 7, 90], timestamp: -1 }]);
    expect(dev.receivers()).toEqual([r]);
    r.close();
    expect(dev.receivers()).toEqual([]);
    expect(() => r.send(new ShortMessage(0xf8), -1)).toThrow(/fermé/);
  });

  it("loopback re-emits what it receives and mutes feedback", () => {
    const dev = new VirtualPlatform().addDevice({ name: "LoopMIDI", loopback: true });
    const self = dev.getTransmitter();
    const r = dev.getReceiver();
    self.setReceiver(r);
    const listener = dev.getTransmitter();
    const rec = recorder();
    listener.setReceiver(rec);
    r.send(new ShortMessage(0x90, 0x40, 0x7f), 10);
    expect(dev.received).toEqual([{ bytes: [0x90, 0x40, 0x7f], timestamp: 10 }]);
    expect(rec.got).toEqual([{ bytes: [0x90, 0x40, 0x7f], ts: 10 }]);
  });

  it("removes devices by name", () => {
    const p = new VirtualPlatform([{ name: "A" }, { name: "B" }]);
    expect(p.removeDevice("A")).toBe(true);
    expect(p.removeDevice("A")).toBe(false);
    expect(p.listDevices().map((d) => d.name)).toEqual(["B"]);
    expect(p.getDevice("B")?.name).toBe("B");
  });
});
