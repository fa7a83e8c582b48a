import { logger } from "../logger";
import { encodeBytes } from "../midi/codec";
import type { NativeMidiMessage } from "../midi/messages";
import type { MidiBytes } from "../midi/types";
import { hex, human } from "../midi/utils";
import { IMMEDIATE, UNLIMITED } from "./types";
import type { MidiPlatform, PlatformDevice, Receiver, Transmitter } from "./types";

const log = logger.child("virtual");

export interface VirtualDeviceOptions {
  name: string;
  /** Le périphérique émet (entrée pour le programme). Défaut: true */
  transmit?: boolean;
  /** Le périphérique reçoit (sortie pour le programme). Défaut: true */
  receive?: boolean;
  /** Ce qui est reçu est ré-émis sur tous les émetteurs ouverts. Défaut: false */
  loopback?: boolean;
}

export interface ReceivedMessage {
  bytes: number[];
  timestamp: number;
}

class VirtualTransmitter implements Transmitter {
  readonly kind = "transmitter" as const;
  private receiver: Receiver | null = null;
  private closed = false;

  constructor(private readonly device: VirtualDevice) {}

  get name(): string {
    return this.device.name;
  }

  setReceiver(receiver: Receiver | null): void {
    this.receiver = receiver;
  }

  getReceiver(): Receiver | null {
    return this.receiver;
  }

  emit(message: NativeMidiMessage, timestamp: number): void {
    if (this.closed) return;
    this.receiver?.send(message, timestamp);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.device.detachTransmitter(this);
  }
}

class VirtualReceiver implements Receiver {
  readonly kind = "receiver" as const;
  private closed = false;

  constructor(private readonly device: VirtualDevice) {}

  get name(): string {
    return this.device.name;
  }

  send(message: NativeMidiMessage, timestamp: number): void {
    if (this.closed) throw new Error(`Récepteur fermé: '${this.device.name}'`);
    this.device.deliver(message, timestamp);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.device.detachReceiver(this);
  }
}

/**
 * Périphérique en mémoire. En mode loopback, une trame reçue pendant que le
 * périphérique ré-émet déjà est ignorée (anti-larsen, comme loopMIDI).
 */
export class VirtualDevice implements PlatformDevice {
  readonly kind = "device" as const;
  readonly maxTransmitters: number;
  readonly maxReceivers: number;
  readonly loopback: boolean;
  readonly received: ReceivedMessage[] = [];
  private readonly openTransmitters = new Set<VirtualTransmitter>();
  private readonly openReceivers = new Set<VirtualReceiver>();
  private dispatching = false;

  constructor(readonly name: string, opts: Omit<VirtualDeviceOptions, "name"> = {}) {
    this.maxTransmitters = opts.transmit === false ? 0 : UNLIMITED;
    this.maxReceivers = opts.receive === false ? 0 : UNLIMITED;
    this.loopback = opts.loopback ?? false;
  }

  getTransmitter(): Transmitter {
    if (this.maxTransmitters === 0) throw new Error(`'${this.name}' n'a pas d'émetteur`);
    const t = new VirtualTransmitter(this);
    this.openTransmitters.add(t);
    return t;
  }

  getReceiver(): Receiver {
    if (this.maxReceivers === 0) throw new Error(`'${this.name}' n'a pas de récepteur`);
    const r = new VirtualReceiver(this);
    this.openReceivers.add(r);
    return r;
  }

  transmitters(): Transmitter[] {
    return [...this.openTransmitters];
  }

  receivers(): Receiver[] {
    return [...this.openReceivers];
  }

  /** Simule une trame arrivant du périphérique (clavier, contrôleur…). */
  inject(bytes: MidiBytes | Uint8Array, timestamp: number = IMMEDIATE): void {
    this.emit(encodeBytes(bytes), timestamp);
  }

  deliver(message: NativeMidiMessage, timestamp: number): void {
    const bytes = message.getMessage();
    if (this.loopback && this.dispatching) {
      log.trace(`'${this.name}': feedback ignoré ${human(bytes)} [${hex(bytes)}]`);
      return;
    }
    this.received.push({ bytes, timestamp });
    if (this.loopback) this.emit(message, timestamp);
  }

  detachTransmitter(t: VirtualTransmitter): void {
    this.openTransmitters.delete(t);
  }

  detachReceiver(r: VirtualReceiver): void {
    this.openReceivers.delete(r);
  }

  private emit(message: NativeMidiMessage, timestamp: number): void {
    this.dispatching = true;
    try {
      for (const t of [...this.openTransmitters]) t.emit(message, timestamp);
    } finally {
      this.dispatching = false;
    }
  }
}

/** Pile MIDI en mémoire: périphériques déclarés par nom et capacités. */
export class VirtualPlatform implements MidiPlatform {
  readonly name = "virtual";
  private readonly devices: VirtualDevice[] = [];

  constructor(devices: VirtualDeviceOptions[] = []) {
    for (const d of devices) this.addDevice(d);
  }

  addDevice(opts: VirtualDeviceOptions): VirtualDevice {
    const { name, ...rest } = opts;
    const device = new VirtualDevice(name, rest);
    this.devices.push(device);
    return device;
  }

  removeDevice(name: string): boolean {
    const idx = this.devices.findIndex((d) => d.name === name);
    if (idx < 0) return false;
    this.devices.splice(idx, 1);
    return true;
  }

  getDevice(name: string): VirtualDevice | undefined {
    return this.devices.find((d) => d.name === name);
  }

  listDevices(): PlatformDevice[] {
    return [...this.devices];
  }
}
