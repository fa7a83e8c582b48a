import { withTransport } from "../errors";
import { logger } from "../logger";
import type { NativeMidiMessage } from "../midi/messages";
import { IMMEDIATE } from "../platform/types";
import type { Receiver, Transmitter } from "../platform/types";
import { disconnect } from "./connections";
import { asTransmitter } from "./endpoint";
import type { Endpoint } from "./endpoint";

/** Callback appelé pour chaque trame entrante; `millis` vaut -1 si non daté. */
export type MidiCallback = (bytes: number[], millis: number) => void;

/** Jeton opaque retourné par `addReceiver`, accepté par `removeReceiver`. */
export interface ReceiverHandle {
  readonly id: number;
  readonly port: string;
}

interface CallbackBinding {
  handle: ReceiverHandle;
  callback: MidiCallback;
  receiver: CallbackReceiver;
  transmitter: Transmitter;
  /** Émetteur ouvert par le registre (port = périphérique): il le referme. */
  ownsTransmitter: boolean;
}

/** Microsecondes plateforme → millisecondes (troncature). `IMMEDIATE` est conservé. */
export function microsToMillis(micros: number): number {
  if (micros === IMMEDIATE) return IMMEDIATE;
  return Math.trunc(micros / 1000);
}

/**
 * Récepteur synthétique enveloppant un callback. `close()` est idempotent;
 * une fois fermé, les livraisons sont ignorées.
 */
export class CallbackReceiver implements Receiver {
  readonly kind = "receiver" as const;
  private closed = false;

  constructor(readonly name: string, private readonly callback: MidiCallback) {}

  get isClosed(): boolean {
    return this.closed;
  }

  send(message: NativeMidiMessage, timestamp: number): void {
    if (this.closed) return;
    this.callback(message.getMessage(), microsToMillis(timestamp));
  }

  close(): void {
    this.closed = true;
  }
}

function isHandle(value: MidiCallback | ReceiverHandle): value is ReceiverHandle {
  return typeof value !== "function";
}

function isBoundTo(binding: CallbackBinding, port: Endpoint): boolean {
  switch (port.kind) {
    case "transmitter":
      return binding.transmitter === port;
    case "device":
      return binding.transmitter.name === port.name;
    case "receiver":
      return false;
  }
}

/**
 * Registre des callbacks attachés à des émetteurs. Une instance par hôte;
 * chaque callback (par identité) a au plus une liaison: ré-enregistrer le même
 * callback ferme d'abord l'ancienne liaison.
 */
export class CallbackRegistry {
  private readonly byCallback = new Map<MidiCallback, CallbackBinding>();
  private nextId = 1;

  get size(): number {
    return this.byCallback.size;
  }

  /**
   * Attache `callback` à `port` (périphérique ou émetteur).
   * @throws UnsupportedDirectionError si `port` ne sait pas émettre
   */
  addReceiver(port: Endpoint, callback: MidiCallback): ReceiverHandle {
    const transmitter = asTransmitter(port);
    const previous = this.byCallback.get(callback);
    if (previous) {
      logger.debug(`Callback déjà enregistré sur '${previous.handle.port}', ancienne liaison fermée.`);
      try {
        this.release(previous);
      } catch (err) {
        // l'ancienne liaison est déjà retirée; la nouvelle reste valable
        logger.warn(`Callback #${previous.handle.id}: fermeture de '${previous.handle.port}' échouée:`, err);
      }
    }
    const receiver = new CallbackReceiver(`callback@${transmitter.name}`, callback);
    transmitter.setReceiver(receiver);
    const handle: ReceiverHandle = Object.freeze({ id: this.nextId++, port: transmitter.name });
    this.byCallback.set(callback, {
      handle,
      callback,
      receiver,
      transmitter,
      ownsTransmitter: port.kind === "device",
    });
    logger.debug(`Callback #${handle.id} attaché à '${transmitter.name}'.`);
    return handle;
  }

  /**
   * Détache un callback (par identité ou par jeton). Sans liaison connue, ou
   * si la liaison est sur un autre port que `port`, ne fait rien et ne signale
   * rien. `port = null` accepte n'importe quel port.
   *
   * Un émetteur fourni par l'appelant reste ouvert: seul son emplacement est
   * vidé, et seulement s'il contient encore le récepteur de ce callback.
   * @throws TransportFailureError si la fermeture de l'émetteur échoue
   */
  removeReceiver(port: Endpoint | null, target: MidiCallback | ReceiverHandle): void {
    const binding = this.lookup(target);
    if (!binding) return;
    if (port && !isBoundTo(binding, port)) {
      logger.debug(`Callback #${binding.handle.id} non attaché à '${port.name}', ignoré.`);
      return;
    }
    this.release(binding);
    logger.debug(`Callback #${binding.handle.id} détaché de '${binding.handle.port}'.`);
  }

  has(target: MidiCallback | ReceiverHandle): boolean {
    return this.lookup(target) !== undefined;
  }

  /**
   * Ferme toutes les liaisons (arrêt de l'hôte). Une fermeture en échec est
   * journalisée et n'empêche pas les suivantes.
   * @returns Nombre de liaisons dont la fermeture a échoué
   */
  closeAll(): number {
    let failures = 0;
    for (const binding of [...this.byCallback.values()]) {
      try {
        this.release(binding);
      } catch (err) {
        failures += 1;
        logger.warn(`Callback #${binding.handle.id}: fermeture de '${binding.handle.port}' échouée:`, err);
      }
    }
    return failures;
  }

  private lookup(target: MidiCallback | ReceiverHandle): CallbackBinding | undefined {
    if (!isHandle(target)) return this.byCallback.get(target);
    for (const binding of this.byCallback.values()) {
      if (binding.handle === target) return binding;
    }
    return undefined;
  }

  private release(binding: CallbackBinding): void {
    const { transmitter, receiver } = binding;
    this.byCallback.delete(binding.callback);
    receiver.close();
    if (transmitter.getReceiver() === receiver) disconnect(transmitter);
    if (binding.ownsTransmitter) {
      withTransport(`fermeture IN '${transmitter.name}'`, () => transmitter.close());
    }
  }
}
