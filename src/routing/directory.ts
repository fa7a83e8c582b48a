import type { MidiPlatform, PlatformDevice } from "../platform/types";
import { withTransport } from "../errors";
import { canReceive, canTransmit } from "./endpoint";

/**
 * Instantané des périphériques au moment de l'appel. L'ordre est celui de la
 * plateforme et peut varier d'une exécution à l'autre.
 */
export function listDevices(platform: MidiPlatform): PlatformDevice[] {
  return withTransport(`énumération ${platform.name}`, () => platform.listDevices());
}

/** Périphériques capables d'émettre (sources pour le programme). */
export function listInputDevices(platform: MidiPlatform): PlatformDevice[] {
  return listDevices(platform).filter(canTransmit);
}

/** Périphériques capables de recevoir (destinations pour le programme). */
export function listOutputDevices(platform: MidiPlatform): PlatformDevice[] {
  return listDevices(platform).filter(canReceive);
}

function findDevice(
  platform: MidiPlatform,
  nameFragment: string,
  capable: (d: PlatformDevice) => boolean
): PlatformDevice | null {
  return listDevices(platform).find((d) => d.name.includes(nameFragment) && capable(d)) ?? null;
}

/**
 * Premier périphérique dont le nom contient `nameFragment` (sensible à la casse)
 * et qui sait émettre: le programme reçoit de ce périphérique.
 */
export function findInputDevice(platform: MidiPlatform, nameFragment: string): PlatformDevice | null {
  return findDevice(platform, nameFragment, canTransmit);
}

/**
 * Premier périphérique dont le nom contient `nameFragment` (sensible à la casse)
 * et qui sait recevoir: le programme envoie vers ce périphérique.
 */
export function findOutputDevice(platform: MidiPlatform, nameFragment: string): PlatformDevice | null {
  return findDevice(platform, nameFragment, canReceive);
}
