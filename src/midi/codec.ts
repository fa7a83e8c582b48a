import { MalformedMessageError } from "../errors";
import { NativeMidiMessage, ShortMessage, SysexMessage } from "./messages";
import { eventTypeOfStatus, SYSEX_START } from "./status";
import type { MidiBytes, MidiEventType, ShortEventType, StructuredMidiMessage } from "./types";

/** Tout ce que `send` accepte: trame brute, forme structurée ou message natif. */
export type MidiMessageInput = MidiBytes | Uint8Array | StructuredMidiMessage | NativeMidiMessage;

function toArray(bytes: MidiBytes | Uint8Array): number[] {
  return Array.from(bytes);
}

/**
 * Classe une trame (ou un status seul) par type d'évènement.
 * Seule la trame vide est refusée; un status inconnu donne "short".
 */
export function classify(input: MidiBytes | Uint8Array | number): MidiEventType {
  if (typeof input === "number") return eventTypeOfStatus(input);
  if (input.length === 0) throw new MalformedMessageError("trame MIDI vide", []);
  return eventTypeOfStatus(input[0]);
}

/**
 * Décode une trame brute en message structuré.
 *
 * - 0xF0 en tête: SysEx, la trame entière est conservée dans `data`
 * - sinon 1 à 3 octets; au-delà, `MalformedMessageError`
 */
export function decode(input: MidiBytes | Uint8Array): StructuredMidiMessage {
  const bytes = toArray(input);
  if (bytes.length === 0) throw new MalformedMessageError("trame MIDI vide", bytes);
  const status = bytes[0];
  if (status === SYSEX_START) {
    return { eventType: "sysexStart", status: SYSEX_START, data: bytes };
  }
  if (bytes.length > 3) {
    throw new MalformedMessageError(`message court de ${bytes.length} octets (max 3)`, bytes);
  }
  // Le status 0xF0 est traité plus haut: ce n'est jamais "sysexStart" ici
  const eventType = eventTypeOfStatus(status);
  return {
    eventType: eventType === "sysexStart" ? "short" : eventType,
    status,
    ...(bytes.length > 1 ? { data1: bytes[1] } : {}),
    ...(bytes.length > 2 ? { data2: bytes[2] } : {}),
  };
}

/**
 * Encode un message structuré en message natif.
 *
 * 0xFF est toujours encodé en Reset (message court), y compris quand le tag
 * vaut "meta": les méta-évènements de fichier ne sont pas supportés.
 */
export function encode(msg: StructuredMidiMessage): NativeMidiMessage {
  if (msg.eventType === "sysexStart") {
    if (msg.data.length === 0 || msg.data[0] !== SYSEX_START) {
      throw new MalformedMessageError("un SysEx doit commencer par 0xF0", toArray(msg.data));
    }
    return new SysexMessage(msg.data);
  }
  if (!Number.isInteger(msg.status) || msg.status < 0x80 || msg.status > 0xff) {
    throw new MalformedMessageError(`status invalide: ${msg.status}`, [msg.status]);
  }
  return new ShortMessage(msg.status, msg.data1 ?? 0, msg.data2 ?? 0);
}

/** Trame brute → message natif. */
export function encodeBytes(bytes: MidiBytes | Uint8Array): NativeMidiMessage {
  return encode(decode(bytes));
}

/** Message structuré → trame telle qu'elle partira sur le fil. */
export function toWire(msg: StructuredMidiMessage): number[] {
  return encode(msg).getMessage();
}

function isStructured(input: MidiMessageInput): input is StructuredMidiMessage {
  return !Array.isArray(input) && !(input instanceof Uint8Array) && !(input instanceof NativeMidiMessage);
}

/** Ramène n'importe quelle forme acceptée à un message natif. */
export function normalizeMessage(input: MidiMessageInput): NativeMidiMessage {
  if (input instanceof NativeMidiMessage) return input;
  if (isStructured(input)) return encode(input);
  return encodeBytes(input);
}

/** Construit un message court structuré (type déduit du status). */
export function shortMessage(status: number, data1?: number, data2?: number): StructuredMidiMessage {
  const eventType = eventTypeOfStatus(status);
  const tag: ShortEventType = eventType === "sysexStart" ? "short" : eventType;
  return {
    eventType: tag,
    status,
    ...(data1 !== undefined ? { data1 } : {}),
    ...(data2 !== undefined ? { data2 } : {}),
  };
}
