/** Trame MIDI brute (forme « fil »). */
export type MidiBytes = readonly number[];

/** Types d'évènements transportés par un message court (1 à 3 octets). */
export type ShortEventType =
  | "noteOff"
  | "noteOn"
  | "polyAftertouch"
  | "controlChange"
  | "programChange"
  | "channelAftertouch"
  | "pitchBend"
  | "timeCode"
  | "songPosition"
  | "songSelect"
  | "tuneRequest"
  | "sysexEnd"
  | "timingClock"
  | "start"
  | "continue"
  | "stop"
  | "activeSensing"
  | "reset"
  // 0xFF lu depuis un fichier; toujours ré-encodé en reset
  | "meta"
  // repli pour les status inconnus
  | "short";

export type MidiEventType = ShortEventType | "sysexStart";

export interface ShortMidiMessage {
  eventType: ShortEventType;
  status: number;
  data1?: number;
  data2?: number;
}

export interface SysexMidiMessage {
  eventType: "sysexStart";
  status: 0xf0;
  /** Trame complète, 0xF0 inclus. */
  data: MidiBytes;
}

/** Forme structurée d'un message, dérivée de la trame par le codec. */
export type StructuredMidiMessage = ShortMidiMessage | SysexMidiMessage;
