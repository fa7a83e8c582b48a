import type { MidiRouter } from "../router";
import type { RouterConfig } from "../config";
import { NotFoundError } from "../errors";
import { logger } from "../logger";
import { RtMidiPlatform } from "../platform/rtmidi";
import { VirtualPlatform } from "../platform/virtual";
import type { MidiPlatform } from "../platform/types";
import type { Connection } from "../routing/connections";

/**
 * Instancie la pile MIDI choisie par la configuration.
 */
export function createPlatform(cfg: RouterConfig): MidiPlatform {
  if (cfg.backend === "virtual") {
    logger.info(`Backend virtuel: ${cfg.virtual_devices.length} périphérique(s).`);
    return new VirtualPlatform(cfg.virtual_devices);
  }
  return new RtMidiPlatform();
}

/**
 * Établit les connexions déclarées. Un périphérique manquant est ignoré si la
 * connexion est `optional`, sinon `NotFoundError`.
 *
 * En cas d'échec, les connexions déjà établies par cet appel sont défaites.
 *
 * @returns Les connexions effectivement établies, dans l'ordre de la configuration
 */
export function applyConnections(router: MidiRouter, cfg: RouterConfig): Connection[] {
  const applied: Connection[] = [];
  try {
    for (const c of cfg.connections) {
      const from = router.findInput(c.from);
      const to = router.findOutput(c.to);
      if (!from || !to) {
        const missing = !from ? new NotFoundError(c.from, "input") : new NotFoundError(c.to, "output");
        if (!c.optional) throw missing;
        logger.warn(`Connexion '${c.from}' -> '${c.to}' ignorée (optional): ${missing.message}`);
        continue;
      }
      applied.push(router.connect(from, to));
    }
  } catch (err) {
    releaseConnections(router, applied);
    throw err;
  }
  return applied;
}

/** Défait les connexions établies par {@link applyConnections}. */
export function releaseConnections(router: MidiRouter, applied: Connection[]): void {
  for (const c of applied) router.disconnect(c.transmitter);
}
