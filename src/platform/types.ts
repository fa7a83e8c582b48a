import type { NativeMidiMessage } from "../midi/messages";

/** Valeur de `maxTransmitters` / `maxReceivers` signifiant « illimité ». */
export const UNLIMITED = -1;

/** Timestamp signifiant « livrer maintenant ». */
export const IMMEDIATE = -1;

/**
 * Récepteur: point d'entrée d'une trame vers un périphérique (ou un callback).
 * `timestamp` est en microsecondes, ou `IMMEDIATE`.
 */
export interface Receiver {
  readonly kind: "receiver";
  readonly name: string;
  send(message: NativeMidiMessage, timestamp: number): void;
  close(): void;
}

/**
 * Émetteur: source de trames entrantes, avec un emplacement unique de récepteur.
 * Affecter un nouveau récepteur remplace silencieusement le précédent.
 */
export interface Transmitter {
  readonly kind: "transmitter";
  readonly name: string;
  setReceiver(receiver: Receiver | null): void;
  getReceiver(): Receiver | null;
  close(): void;
}

/**
 * Périphérique tel qu'énuméré par la pile MIDI de l'hôte.
 * `maxTransmitters` / `maxReceivers`: 0 = direction non supportée, `UNLIMITED` = sans limite.
 */
export interface PlatformDevice {
  readonly kind: "device";
  readonly name: string;
  readonly maxTransmitters: number;
  readonly maxReceivers: number;
  /** Ouvre un nouvel émetteur sur le périphérique. */
  getTransmitter(): Transmitter;
  /** Ouvre un nouveau récepteur sur le périphérique. */
  getReceiver(): Receiver;
  /** Émetteurs actuellement ouverts. */
  transmitters(): Transmitter[];
  /** Récepteurs actuellement ouverts. */
  receivers(): Receiver[];
}

/** Pile MIDI de l'hôte (énumération des périphériques). */
export interface MidiPlatform {
  readonly name: string;
  listDevices(): PlatformDevice[];
}
