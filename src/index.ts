export { MidiRouter } from "./router";

export { classify, decode, encode, encodeBytes, normalizeMessage, shortMessage, toWire } from "./midi/codec";
export type { MidiMessageInput } from "./midi/codec";
export { NativeMidiMessage, ShortMessage, SysexMessage } from "./midi/messages";
export { dataLength, eventTypeOfStatus, SYSEX_END, SYSEX_START, SYSTEM_RESET } from "./midi/status";
export type {
  MidiBytes,
  MidiEventType,
  ShortEventType,
  ShortMidiMessage,
  StructuredMidiMessage,
  SysexMidiMessage,
} from "./midi/types";
export { hex, human } from "./midi/utils";

export { asReceiver, asTransmitter, canReceive, canTransmit, endpointName } from "./routing/endpoint";
export type { Endpoint } from "./routing/endpoint";
export {
  findInputDevice,
  findOutputDevice,
  listDevices,
  listInputDevices,
  listOutputDevices,
} from "./routing/directory";
export { connect, disconnect, openReceivers, openTransmitters, send } from "./routing/connections";
export type { Connection } from "./routing/connections";
export { CallbackReceiver, CallbackRegistry, microsToMillis } from "./routing/registry";
export type { MidiCallback, ReceiverHandle } from "./routing/registry";

export { IMMEDIATE, UNLIMITED } from "./platform/types";
export type { MidiPlatform, PlatformDevice, Receiver, Transmitter } from "./platform/types";
export { RtMidiPlatform } from "./platform/rtmidi";
export { VirtualDevice, VirtualPlatform } from "./platform/virtual";
export type { ReceivedMessage, VirtualDeviceOptions } from "./platform/virtual";

export {
  isMidiRoutingError,
  MalformedMessageError,
  MidiRoutingError,
  NotFoundError,
  TransportFailureError,
  UnsupportedDirectionError,
} from "./errors";
export type { MidiErrorCode } from "./errors";

export { createLogger, getLogLevel, logger, setLogLevel } from "./logger";
export type { Logger, LogLevel } from "./logger";
