import { UnsupportedDirectionError, withTransport } from "../errors";
import type { PlatformDevice, Receiver, Transmitter } from "../platform/types";

/**
 * Endpoint: périphérique, émetteur ou récepteur de la plateforme,
 * discriminé par `kind`.
 */
export type Endpoint = PlatformDevice | Transmitter | Receiver;

export function endpointName(endpoint: Endpoint): string {
  return endpoint.name;
}

/** Vrai si le périphérique annonce au moins un émetteur (ou un nombre illimité). */
export function canTransmit(endpoint: Endpoint): boolean {
  switch (endpoint.kind) {
    case "device":
      return endpoint.maxTransmitters !== 0;
    case "transmitter":
      return true;
    case "receiver":
      return false;
  }
}

/** Vrai si le périphérique annonce au moins un récepteur (ou un nombre illimité). */
export function canReceive(endpoint: Endpoint): boolean {
  switch (endpoint.kind) {
    case "device":
      return endpoint.maxReceivers !== 0;
    case "transmitter":
      return false;
    case "receiver":
      return true;
  }
}

/**
 * Convertit un endpoint en émetteur. Un périphérique ouvre un nouvel émetteur
 * à chaque appel; un émetteur est retourné tel quel.
 * @throws UnsupportedDirectionError
 */
export function asTransmitter(endpoint: Endpoint): Transmitter {
  switch (endpoint.kind) {
    case "transmitter":
      return endpoint;
    case "device": {
      const device = endpoint;
      if (!canTransmit(device)) throw new UnsupportedDirectionError(device.name, "transmit");
      return withTransport(`ouverture IN '${device.name}'`, () => device.getTransmitter());
    }
    case "receiver":
      throw new UnsupportedDirectionError(endpoint.name, "transmit");
  }
}

/**
 * Convertit un endpoint en récepteur. Un périphérique ouvre un nouveau
 * récepteur à chaque appel; un récepteur est retourné tel quel.
 * @throws UnsupportedDirectionError
 */
export function asReceiver(endpoint: Endpoint): Receiver {
  switch (endpoint.kind) {
    case "receiver":
      return endpoint;
    case "device": {
      const device = endpoint;
      if (!canReceive(device)) throw new UnsupportedDirectionError(device.name, "receive");
      return withTransport(`ouverture OUT '${device.name}'`, () => device.getReceiver());
    }
    case "transmitter":
      throw new UnsupportedDirectionError(endpoint.name, "receive");
  }
}
