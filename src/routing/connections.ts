import { withTransport } from "../errors";
import { logger } from "../logger";
import { normalizeMessage } from "../midi/codec";
import type { MidiMessageInput } from "../midi/codec";
import { hex, human } from "../midi/utils";
import { IMMEDIATE } from "../platform/types";
import type { PlatformDevice, Receiver, Transmitter } from "../platform/types";
import { asReceiver, asTransmitter } from "./endpoint";
import type { Endpoint } from "./endpoint";

/** Arête dirigée émetteur → récepteur. */
export interface Connection {
  readonly transmitter: Transmitter;
  readonly receiver: Receiver;
}

/**
 * Câble `from` vers `to`. L'émetteur n'a qu'un emplacement: un récepteur déjà
 * affecté est remplacé sans notification.
 * @throws UnsupportedDirectionError si `from` ne sait pas émettre ou `to` recevoir
 */
export function connect(from: Endpoint, to: Endpoint): Connection {
  const transmitter = asTransmitter(from);
  const receiver = asReceiver(to);
  const previous = transmitter.getReceiver();
  transmitter.setReceiver(receiver);
  if (previous && previous !== receiver) {
    logger.debug(`Connexion remplacée: '${transmitter.name}' -/-> '${previous.name}'.`);
  }
  logger.info(`Connexion: '${transmitter.name}' -> '${receiver.name}'.`);
  return { transmitter, receiver };
}

/**
 * Vide l'emplacement de l'émetteur. Sans coercition: il faut passer
 * l'émetteur réellement utilisé par `connect`. Idempotent.
 */
export function disconnect(transmitter: Transmitter): void {
  if (transmitter.getReceiver() === null) return;
  transmitter.setReceiver(null);
  logger.info(`Déconnexion: '${transmitter.name}'.`);
}

/**
 * Envoie un message (trame, forme structurée ou message natif) vers `to`.
 * `timestamp` en microsecondes; `IMMEDIATE` (-1) pour « maintenant ».
 *
 * Un périphérique ouvre un récepteur dédié à chaque appel, refermé après
 * l'envoi; passer un récepteur déjà ouvert pour les envois répétés.
 * @throws MalformedMessageError | UnsupportedDirectionError | TransportFailureError
 */
export function send(to: Endpoint, message: MidiMessageInput, timestamp: number = IMMEDIATE): void {
  const native = normalizeMessage(message);
  const receiver = asReceiver(to);
  const bytes = native.getMessage();
  logger.trace(`TX -> ${receiver.name}: ${human(bytes)} [${hex(bytes)}] ts=${timestamp}`);
  try {
    withTransport(`envoi vers '${receiver.name}'`, () => receiver.send(native, timestamp));
  } finally {
    if (to.kind === "device") {
      withTransport(`fermeture OUT '${receiver.name}'`, () => receiver.close());
    }
  }
}

/** Émetteurs actuellement ouverts sur un périphérique. */
export function openTransmitters(device: PlatformDevice): Transmitter[] {
  return device.transmitters();
}

/** Récepteurs actuellement ouverts sur un périphérique. */
export function openReceivers(device: PlatformDevice): Receiver[] {
  return device.receivers();
}
