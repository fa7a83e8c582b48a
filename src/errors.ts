/**
 * Taxonomie des erreurs de la couche de routage.
 *
 * Chaque erreur porte un `code` stable, exploitable sans `instanceof`
 * (ex: après un passage par un worker ou un log structuré).
 */
export type MidiErrorCode =
  | "MALFORMED_MESSAGE"
  | "UNSUPPORTED_DIRECTION"
  | "NOT_FOUND"
  | "TRANSPORT_FAILURE";

export class MidiRoutingError extends Error {
  constructor(readonly code: MidiErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Trame invalide à l'encodage (vide, trop longue, octet hors bornes…). */
export class MalformedMessageError extends MidiRoutingError {
  constructor(message: string, readonly bytes?: readonly number[]) {
    super("MALFORMED_MESSAGE", message);
  }
}

/** L'endpoint ne sait pas émettre (ou recevoir) dans la direction demandée. */
export class UnsupportedDirectionError extends MidiRoutingError {
  constructor(readonly endpoint: string, readonly direction: "transmit" | "receive") {
    super("UNSUPPORTED_DIRECTION", `'${endpoint}' ne supporte pas la direction '${direction}'`);
  }
}

/** Aucun périphérique ne correspond à un nom + capacité. */
export class NotFoundError extends MidiRoutingError {
  constructor(readonly query: string, readonly direction: "input" | "output") {
    super("NOT_FOUND", `Aucun périphérique ${direction} ne correspond à '${query}'`);
  }
}

/** Erreur opaque de la pile MIDI sous-jacente, conservée dans `cause`. */
export class TransportFailureError extends MidiRoutingError {
  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("TRANSPORT_FAILURE", `${operation}: ${detail}`, { cause });
  }
}

export function isMidiRoutingError(err: unknown, code?: MidiErrorCode): err is MidiRoutingError {
  return err instanceof MidiRoutingError && (code === undefined || err.code === code);
}

/** Exécute une primitive de transport en convertissant ses erreurs en `TransportFailureError`. */
export function withTransport<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof MidiRoutingError) throw err;
    throw new TransportFailureError(operation, err);
  }
}
