import { withTransport } from "./errors";
import { logger } from "./logger";
import type { MidiMessageInput } from "./midi/codec";
import { IMMEDIATE } from "./platform/types";
import type { MidiPlatform, PlatformDevice, Receiver, Transmitter } from "./platform/types";
import { connect, disconnect, send } from "./routing/connections";
import type { Connection } from "./routing/connections";
import { findInputDevice, findOutputDevice, listDevices } from "./routing/directory";
import { asReceiver, asTransmitter } from "./routing/endpoint";
import type { Endpoint } from "./routing/endpoint";
import { CallbackRegistry } from "./routing/registry";
import type { MidiCallback, ReceiverHandle } from "./routing/registry";

/**
 * Façade de routage pour un hôte: découverte, câblage, envoi et callbacks
 * sur une plateforme donnée.
 *
 * Invariants clés:
 * - Un périphérique source a un seul émetteur ouvert par le routeur, réutilisé
 *   par chaque `connect`: la dernière connexion remplace la précédente
 * - Un périphérique destination a un seul récepteur ouvert, partagé par
 *   `connect` et `send`
 * - `shutdown()` ferme tout ce que le routeur a ouvert, callbacks compris
 */
export class MidiRouter {
  private readonly transmitters = new Map<PlatformDevice, Transmitter>();
  private readonly receivers = new Map<PlatformDevice, Receiver>();

  constructor(
    readonly platform: MidiPlatform,
    private readonly registry: CallbackRegistry = new CallbackRegistry()
  ) {}

  listDevices(): PlatformDevice[] {
    return listDevices(this.platform);
  }

  /** Périphérique depuis lequel recevoir (sait émettre), ou null. */
  findInput(nameFragment: string): PlatformDevice | null {
    return findInputDevice(this.platform, nameFragment);
  }

  /** Périphérique vers lequel envoyer (sait recevoir), ou null. */
  findOutput(nameFragment: string): PlatformDevice | null {
    return findOutputDevice(this.platform, nameFragment);
  }

  connect(from: Endpoint, to: Endpoint): Connection {
    return connect(this.transmitterFor(from), this.receiverFor(to));
  }

  /** Déconnecte un émetteur, ou l'émetteur ouvert par le routeur pour un périphérique. */
  disconnect(port: PlatformDevice | Transmitter): void {
    const transmitter = port.kind === "device" ? this.transmitters.get(port) : port;
    if (transmitter) disconnect(transmitter);
  }

  send(to: Endpoint, message: MidiMessageInput, timestamp: number = IMMEDIATE): void {
    send(this.receiverFor(to), message, timestamp);
  }

  addReceiver(port: Endpoint, callback: MidiCallback): ReceiverHandle {
    return this.registry.addReceiver(port, callback);
  }

  removeReceiver(port: Endpoint | null, target: MidiCallback | ReceiverHandle): void {
    this.registry.removeReceiver(port, target);
  }

  /** Opération de port: attache un callback à un périphérique ou un émetteur. */
  setReceiver(port: PlatformDevice | Transmitter, callback: MidiCallback): ReceiverHandle {
    return this.addReceiver(port, callback);
  }

  /** Opération de port: écrit un message vers un périphérique ou un récepteur. */
  write(port: PlatformDevice | Receiver, message: MidiMessageInput, timestamp: number = IMMEDIATE): void {
    this.send(port, message, timestamp);
  }

  /**
   * Ferme les ports mis en cache devenus inutiles: émetteurs à l'emplacement
   * vide, récepteurs qu'aucun émetteur du routeur n'alimente. Ils seront
   * rouverts au prochain `connect` ou `send`.
   * @returns Nombre de ports fermés
   */
  closeIdlePorts(): number {
    let closed = 0;
    for (const [device, t] of [...this.transmitters]) {
      if (t.getReceiver() !== null) continue;
      this.transmitters.delete(device);
      withTransport(`fermeture IN '${t.name}'`, () => t.close());
      closed += 1;
    }
    const fed = new Set<Receiver | null>([...this.transmitters.values()].map((t) => t.getReceiver()));
    for (const [device, r] of [...this.receivers]) {
      if (fed.has(r)) continue;
      this.receivers.delete(device);
      withTransport(`fermeture OUT '${r.name}'`, () => r.close());
      closed += 1;
    }
    if (closed > 0) logger.debug(`${closed} port(s) inutilisé(s) fermé(s).`);
    return closed;
  }

  /** Ferme callbacks, connexions et ports ouverts par le routeur. */
  shutdown(): void {
    const step = (label: string, fn: () => void): void => {
      try {
        fn();
      } catch (err) {
        logger.warn(`Arrêt routeur: ${label} échoué:`, err);
      }
    };
    step("callbacks", () => this.registry.closeAll());
    for (const t of this.transmitters.values()) {
      step(`IN '${t.name}'`, () => {
        disconnect(t);
        t.close();
      });
    }
    for (const r of this.receivers.values()) step(`OUT '${r.name}'`, () => r.close());
    this.transmitters.clear();
    this.receivers.clear();
    logger.info("Routeur MIDI arrêté.");
  }

  private transmitterFor(port: Endpoint): Transmitter {
    if (port.kind !== "device") return asTransmitter(port);
    const cached = this.transmitters.get(port);
    if (cached) return cached;
    const opened = asTransmitter(port);
    this.transmitters.set(port, opened);
    return opened;
  }

  private receiverFor(port: Endpoint): Receiver {
    if (port.kind !== "device") return asReceiver(port);
    const cached = this.receivers.get(port);
    if (cached) return cached;
    const opened = asReceiver(port);
    this.receivers.set(port, opened);
    return opened;
  }
}
