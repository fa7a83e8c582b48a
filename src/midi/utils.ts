import { decode } from "./codec";
import type { MidiBytes } from "./types";

/**
 * Retourne une représentation hexadécimale lisible (ex: "90 40 7f").
 */
export function hex(bytes: MidiBytes | Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join(" ");
}

/**
 * Retourne une description courte d'une trame pour les logs
 * (type, canal et octets de données quand ils existent).
 */
export function human(bytes: MidiBytes | Uint8Array): string {
  if (bytes.length === 0) return "Empty";
  if (bytes.length > 3 && bytes[0] !== 0xf0) return `Invalid len=${bytes.length}`;
  const msg = decode(bytes);
  if (msg.eventType === "sysexStart") return `SysEx len=${msg.data.length}`;
  const parts: string[] = [msg.eventType];
  if (msg.status >= 0x80 && msg.status < 0xf0) parts.push(`ch=${(msg.status & 0x0f) + 1}`);
  if (msg.eventType === "short") parts.push(`status=0x${msg.status.toString(16)}`);
  if (msg.data1 !== undefined) parts.push(`d1=${msg.data1}`);
  if (msg.data2 !== undefined) parts.push(`d2=${msg.data2}`);
  return parts.join(" ");
}
