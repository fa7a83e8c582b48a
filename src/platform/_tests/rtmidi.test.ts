import { describe, it, expect, vi, beforeEach } from "vitest";

const fake = vi.hoisted(() => {
  const state = {
    inputNames: [] as string[],
    outputNames: [] as string[],
    inputs: [] as FakeInput[],
    outputs: [] as FakeOutput[],
    failOpen: false,
  };
  class FakeInput {
    handler: ((delta: number, data: number[]) => void) | null = null;
    openedIndex: number | null = null;
    closeCalls = 0;
    ignored: boolean[] = [];
    constructor() { state.inputs.push(this); }
    getPortCount() { return state.inputNames.length; }
    getPortName(i: number) { return state.inputNames[i]; }
    openPort(i: number) {
      if (state.failOpen) throw new Error("port busy");
      this.openedIndex = i;
    }
    closePort() { this.closeCalls += 1; }
    ignoreTypes(sysex: boolean, timing: boolean, sensing: boolean) { this.ignored = [sysex, timing, sensing]; }
    on(evt: string, cb: (delta: number, data: number[]) => void) { if (evt === "message") this.handler = cb; }
    trigger(delta: number, data: number[]) { this.handler?.(delta, data); }
  }
  class FakeOutput {
    openedIndex: number | null = null;
    closeCalls = 0;
    sent: number[][] = [];
    constructor() { state.outputs.push(this); }
    getPortCount() { return state.outputNames.length; }
    getPortName(i: number) { return state.outputNames[i]; }
    openPort(i: number) {
      if (state.failOpen) throw new Error("port busy");
      this.openedIndex = i;
    }
    closePort() { this.closeCalls += 1; }
    sendMessage(msg: number[]) { this.sent.push(msg); }
  }
  return { state, FakeInput, FakeOutput };
});

vi.mock("@julusian/midi", () => ({ Input: fake.FakeInput, Output: fake.FakeOutput }));

import { RtMidiPlatform, listPortNames } from "../rtmidi";
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

describe("platform/RtMidiPlatform", () => {
  beforeEach(() => {
    fake.state.inputNames = ["Keystep", "LoopMIDI"];
    fake.state.outputNames = ["LoopMIDI", "Synth"];
    fake.state.inputs.length = 0;
    fake.state.outputs.length = 0;
    fake.state.failOpen = false;
  });

  it("merges input and output port names into devices", () => {
    const devices = new RtMidiPlatform().listDevices();
    expect(devices.map((d) => [d.name, d.maxTransmitters, d.maxReceivers])).toEqual([
      ["Keystep", -1, 0],
      ["LoopMIDI", -1, -1],
      ["Synth", 0, -1],
    ]);
    expect(fake.state.inputs.every((i) => i.closeCalls === 1)).toBe(true);
    expect(fake.state.outputs.every((o) => o.closeCalls === 1)).toBe(true);
  });

  it("keeps device identity across enumerations", () => {
    const p = new RtMidiPlatform();
    const first = p.listDevices()[1];
    const second = p.listDevices()[1];
    expect(second).toBe(first);
  });

  it("transmitters forward messages with accumulated microsecond timestamps", () => {
    const keystep = new RtMidiPlatform().listDevices()[0];
    const t = keystep.getTransmitter();
    const input = fake.state.inputs[fake.state.inputs.length - 1];
    expect(input.openedIndex).toBe(0);
    expect(input.ignored).toEqual([false, false, false]);
    const rec = recorder();
    t.setReceiver(rec);
    input.trigger(0.5, [0x90, 0x40, 0x7f]);
    input.trigger(0.25, [0x80, 0x40, 0x00]);
    expect(rec.got).toEqual([
      { bytes: [0x90, 0x40, 0x7f], ts: 500000 },
      { bytes: [0x80, 0x40, 0x00], ts: 750000 },
    ]);
    expect(keystep.transmitters()).toEqual([t]);
    t.close();
    expect(input.closeCalls).toBe(1);
    expect(keystep.transmitters()).toEqual([]);
    input.trigger(0.1, [0x90, 1, 1]);
    expect(rec.got.length).toBe(2);
  });

  it("receivers open the output port and send bytes", () => {
    const synth = new RtMidiPlatform().listDevices()[2];
    const r = synth.getReceiver();
    const output = fake.state.outputs[fake.state.outputs.length - 1];
    expect(output.openedIndex).toBe(1);
    r.send(new ShortMessage(0xb0, 7, 100), -1);
    expect(output.sent).toEqual([[0xb0, 7, 100]]);
    r.close();
    r.close();
    expect(output.closeCalls).toBe(1);
    expect(synth.receivers()).toEqual([]);
  });

  it("fails to open a port that disappeared since enumeration", () => {
    const keystep = new RtMidiPlatform().listDevices()[0];
    fake.state.inputNames = [];
    expect(() => keystep.getTransmitter()).toThrow(/Port IN introuvable/);
  });

  it("closes the native handle when opening the port fails", () => {
    const loop = new RtMidiPlatform().listDevices()[1];
    fake.state.failOpen = true;
    expect(() => loop.getTransmitter()).toThrow("port busy");
    expect(() => loop.getReceiver()).toThrow("port busy");
    const input = fake.state.inputs[fake.state.inputs.length - 1];
    const output = fake.state.outputs[fake.state.outputs.length - 1];
    expect(input.closeCalls).toBe(1);
    expect(input.handler).toBeNull();
    expect(output.closeCalls).toBe(1);
    expect(loop.transmitters()).toEqual([]);
    expect(loop.receivers()).toEqual([]);
  });

  it("listPortNames reads names in order", () => {
    const names = listPortNames({ getPortCount: () => 2, getPortName: (i: number) => ["A", "B"][i] });
    expect(names).toEqual(["A", "B"]);
  });
});
