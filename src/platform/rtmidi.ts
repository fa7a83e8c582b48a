import { Input, Output } from "@julusian/midi";
import { withTransport } from "../errors";
import { logger } from "../logger";
import { encodeBytes } from "../midi/codec";
import type { NativeMidiMessage } from "../midi/messages";
import { hex, human } from "../midi/utils";
import { UNLIMITED } from "./types";
import type { MidiPlatform, PlatformDevice, Receiver, Transmitter } from "./types";

const log = logger.child("rtmidi");

type PortLister = Pick<Input, "getPortCount" | "getPortName">;

/** Noms des ports exposés par une instance RtMidi, dans l'ordre d'énumération. */
export function listPortNames(device: PortLister): string[] {
  const names: string[] = [];
  const count = device.getPortCount();
  for (let i = 0; i < count; i += 1) names.push(device.getPortName(i));
  return names;
}

function findPortIndexByName(device: PortLister, name: string): number | null {
  const idx = listPortNames(device).indexOf(name);
  return idx < 0 ? null : idx;
}

/**
 * Émetteur adossé à un `Input` RtMidi. Les deltas (secondes) fournis par
 * RtMidi sont cumulés en microsecondes depuis l'ouverture du port.
 */
class RtMidiTransmitter implements Transmitter {
  readonly kind = "transmitter" as const;
  private receiver: Receiver | null = null;
  private micros = 0;
  private closed = false;

  constructor(private readonly device: RtMidiDevice, private readonly input: Input) {
    input.ignoreTypes(false, false, false);
    input.on("message", (deltaSeconds: number, data: number[]) => this.onMessage(deltaSeconds, data));
  }

  get name(): string {
    return this.device.name;
  }

  setReceiver(receiver: Receiver | null): void {
    this.receiver = receiver;
  }

  getReceiver(): Receiver | null {
    return this.receiver;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.receiver = null;
    this.device.detachTransmitter(this);
    withTransport(`fermeture IN '${this.name}'`, () => this.input.closePort());
    log.debug(`IN fermé '${this.name}'.`);
  }

  private onMessage(delta: number, data: number[]): void {
    this.micros += Math.round(delta * 1_000_000);
    const target = this.receiver;
    if (this.closed || !target) return;
    try {
      log.trace(`RX <- ${this.name}: ${human(data)} [${hex(data)}]`);
      target.send(encodeBytes(data), this.micros);
    } catch (err) {
      log.warn(`livraison échouée depuis '${this.name}':`, err);
    }
  }
}

/** Récepteur adossé à un `Output` RtMidi; RtMidi envoie toujours immédiatement. */
class RtMidiReceiver implements Receiver {
  readonly kind = "receiver" as const;
  private closed = false;

  constructor(private readonly device: RtMidiDevice, private readonly output: Output) {}

  get name(): string {
    return this.device.name;
  }

  send(message: NativeMidiMessage, _timestamp: number): void {
    if (this.closed) throw new Error(`Port OUT fermé '${this.name}'`);
    const bytes = message.getMessage();
    log.trace(`TX -> ${this.name}: ${human(bytes)} [${hex(bytes)}]`);
    this.output.sendMessage(bytes);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.device.detachReceiver(this);
    withTransport(`fermeture OUT '${this.name}'`, () => this.output.closePort());
    log.debug(`OUT fermé '${this.name}'.`);
  }
}

/**
 * Périphérique RtMidi: un nom de port d'entrée le rend émetteur, un nom de
 * port de sortie le rend récepteur (sans limite d'ouvertures).
 */
export class RtMidiDevice implements PlatformDevice {
  readonly kind = "device" as const;
  private hasInput = false;
  private hasOutput = false;
  private readonly openTransmitters = new Set<RtMidiTransmitter>();
  private readonly openReceivers = new Set<RtMidiReceiver>();

  constructor(readonly name: string) {}

  get maxTransmitters(): number {
    return this.hasInput ? UNLIMITED : 0;
  }

  get maxReceivers(): number {
    return this.hasOutput ? UNLIMITED : 0;
  }

  updatePorts(hasInput: boolean, hasOutput: boolean): void {
    this.hasInput = hasInput;
    this.hasOutput = hasOutput;
  }

  getTransmitter(): Transmitter {
    const input = new Input();
    const idx = findPortIndexByName(input, this.name);
    if (idx == null) {
      input.closePort();
      throw new Error(`Port IN introuvable pour '${this.name}'`);
    }
    try {
      input.openPort(idx);
    } catch (err) {
      input.closePort();
      throw err;
    }
    const t = new RtMidiTransmitter(this, input);
    this.openTransmitters.add(t);
    log.debug(`IN ouvert '${this.name}' (index=${idx}).`);
    return t;
  }

  getReceiver(): Receiver {
    const output = new Output();
    const idx = findPortIndexByName(output, this.name);
    if (idx == null) {
      output.closePort();
      throw new Error(`Port OUT introuvable pour '${this.name}'`);
    }
    try {
      output.openPort(idx);
    } catch (err) {
      output.closePort();
      throw err;
    }
    const r = new RtMidiReceiver(this, output);
    this.openReceivers.add(r);
    log.debug(`OUT ouvert '${this.name}' (index=${idx}).`);
    return r;
  }

  transmitters(): Transmitter[] {
    return [...this.openTransmitters];
  }

  receivers(): Receiver[] {
    return [...this.openReceivers];
  }

  detachTransmitter(t: RtMidiTransmitter): void {
    this.openTransmitters.delete(t);
  }

  detachReceiver(r: RtMidiReceiver): void {
    this.openReceivers.delete(r);
  }
}

/**
 * Pile MIDI native via `@julusian/midi` (RtMidi). Les objets périphériques
 * sont conservés d'une énumération à l'autre pour garder la trace des ports
 * ouverts; seuls les noms présents à l'appel sont retournés.
 */
export class RtMidiPlatform implements MidiPlatform {
  readonly name = "rtmidi";
  private readonly known = new Map<string, RtMidiDevice>();

  listDevices(): PlatformDevice[] {
    const inputNames = withTransport("énumération IN", () => {
      const input = new Input();
      const names = listPortNames(input);
      input.closePort();
      return names;
    });
    const outputNames = withTransport("énumération OUT", () => {
      const output = new Output();
      const names = listPortNames(output);
      output.closePort();
      return names;
    });

    const ordered = [...inputNames, ...outputNames.filter((n) => !inputNames.includes(n))];
    const devices: RtMidiDevice[] = [];
    for (const name of new Set(ordered)) {
      let device = this.known.get(name);
      if (!device) {
        device = new RtMidiDevice(name);
        this.known.set(name, device);
      }
      device.updatePorts(inputNames.includes(name), outputNames.includes(name));
      devices.push(device);
    }
    return devices;
  }
}
