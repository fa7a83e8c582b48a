import type { MidiEventType } from "./types";

export const SYSEX_START = 0xf0;
export const SYSEX_END = 0xf7;
export const SYSTEM_RESET = 0xff;

const channelKinds: Record<number, MidiEventType> = {
  0x8: "noteOff",
  0x9: "noteOn",
  0xa: "polyAftertouch",
  0xb: "controlChange",
  0xc: "programChange",
  0xd: "channelAftertouch",
  0xe: "pitchBend",
};

// 0xF4, 0xF5, 0xF9 et 0xFD sont non définis par la norme
const systemKinds: Record<number, MidiEventType> = {
  0xf0: "sysexStart",
  0xf1: "timeCode",
  0xf2: "songPosition",
  0xf3: "songSelect",
  0xf6: "tuneRequest",
  0xf7: "sysexEnd",
  0xf8: "timingClock",
  0xfa: "start",
  0xfb: "continue",
  0xfc: "stop",
  0xfe: "activeSensing",
  0xff: "reset",
};

/**
 * Type d'évènement porté par un octet de status.
 * Ne lève jamais: un octet inconnu (ou un octet de données) donne "short".
 */
export function eventTypeOfStatus(status: number): MidiEventType {
  if (status >= 0xf0) return systemKinds[status] ?? "short";
  if (status >= 0x80) return channelKinds[status >> 4] ?? "short";
  return "short";
}

/**
 * Nombre d'octets de données qui suivent un status, ou -1 si la longueur
 * est variable (SysEx) ou le status invalide.
 */
export function dataLength(status: number): number {
  if (!Number.isInteger(status) || status < 0x80 || status > 0xff) return -1;
  if (status < 0xf0) {
    const nibble = status >> 4;
    return nibble === 0xc || nibble === 0xd ? 1 : 2;
  }
  switch (status) {
    case SYSEX_START:
      return -1;
    case 0xf1:
    case 0xf3:
      return 1;
    case 0xf2:
      return 2;
    default:
      return 0;
  }
}
