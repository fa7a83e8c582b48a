import { MalformedMessageError } from "../errors";
import { dataLength, eventTypeOfStatus, SYSEX_START } from "./status";
import type { MidiBytes, MidiEventType } from "./types";

function isByte(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xff;
}

function isDataByte(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0x7f;
}

/**
 * Message natif tel que le transport le manipule. Immuable: la trame est
 * copiée à la construction et à chaque lecture.
 */
export abstract class NativeMidiMessage {
  protected readonly bytes: readonly number[];

  protected constructor(bytes: MidiBytes) {
    this.bytes = Object.freeze(bytes.slice());
  }

  get status(): number {
    return this.bytes[0] ?? 0;
  }

  get length(): number {
    return this.bytes.length;
  }

  get eventType(): MidiEventType {
    return eventTypeOfStatus(this.status);
  }

  getMessage(): number[] {
    return this.bytes.slice();
  }
}

/** Message court: status + 0, 1 ou 2 octets de données selon le status. */
export class ShortMessage extends NativeMidiMessage {
  constructor(status: number, data1: number = 0, data2: number = 0) {
    const len = dataLength(status);
    if (status === SYSEX_START) {
      throw new MalformedMessageError("0xF0 ne peut pas être encodé en message court", [status]);
    }
    if (len < 0) {
      throw new MalformedMessageError(`status invalide: ${status}`, [status]);
    }
    const data = [data1, data2].slice(0, len);
    const bad = data.find((d) => !isDataByte(d));
    if (bad !== undefined) {
      throw new MalformedMessageError(`octet de données hors bornes (0..127): ${bad}`, [status, ...data]);
    }
    super([status, ...data]);
  }
}

/** Message exclusif (SysEx) de longueur variable, commençant par 0xF0. */
export class SysexMessage extends NativeMidiMessage {
  constructor(data: MidiBytes | Uint8Array) {
    const bytes = Array.from(data);
    if (bytes.length === 0 || bytes[0] !== SYSEX_START) {
      throw new MalformedMessageError("un SysEx doit commencer par 0xF0", bytes);
    }
    if (!bytes.every(isByte)) {
      throw new MalformedMessageError("octet hors bornes (0..255) dans le SysEx", bytes);
    }
    super(bytes);
  }
}
