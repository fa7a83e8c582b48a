import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import chokidar from "chokidar";
import { isLogLevel } from "./logger";
import type { LogLevel } from "./logger";
import type { VirtualDeviceOptions } from "./platform/virtual";

/** Pile MIDI utilisée par l'hôte. */
export type BackendName = "rtmidi" | "virtual";

/**
 * Connexion déclarée: `from` (fragment de nom d'un périphérique émetteur)
 * vers `to` (fragment de nom d'un périphérique récepteur).
 */
export interface ConnectionConfig {
  from: string;
  to: string;
  /** Si true, ignorer proprement si un des périphériques n'existe pas */
  optional?: boolean;
}

/**
 * Configuration racine de l'hôte.
 */
export interface RouterConfig {
  /** Défaut: "rtmidi" */
  backend: BackendName;
  /** Niveau de log (surchargé par LOG_LEVEL s'il est défini) */
  log_level?: LogLevel;
  /** Périphériques en mémoire, pour `backend: virtual` */
  virtual_devices: VirtualDeviceOptions[];
  /** Câblages à établir au démarrage (et à chaque rechargement) */
  connections: ConnectionConfig[];
}

const DEFAULT_PATHS = ["config.yaml", path.join("config", "config.yaml")];

type RawObject = { [key: string]: unknown };

function isObject(value: unknown): value is RawObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalBoolean(value: unknown, where: string): boolean | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") throw new Error(`${where}: booléen attendu`);
  return value;
}

function requiredString(value: unknown, where: string): string {
  if (typeof value !== "string" || value.length === 0) throw new Error(`${where}: chaîne non vide attendue`);
  return value;
}

function listOf<T>(value: unknown, where: string, item: (raw: unknown, where: string) => T): T[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) throw new Error(`${where}: liste attendue`);
  return value.map((raw, i) => item(raw, `${where}[${i}]`));
}

function parseVirtualDevice(raw: unknown, where: string): VirtualDeviceOptions {
  if (typeof raw === "string") return { name: raw };
  if (!isObject(raw)) throw new Error(`${where}: objet ou nom attendu`);
  const dev: VirtualDeviceOptions = { name: requiredString(raw.name, `${where}.name`) };
  const transmit = optionalBoolean(raw.transmit, `${where}.transmit`);
  const receive = optionalBoolean(raw.receive, `${where}.receive`);
  const loopback = optionalBoolean(raw.loopback, `${where}.loopback`);
  if (transmit !== undefined) dev.transmit = transmit;
  if (receive !== undefined) dev.receive = receive;
  if (loopback !== undefined) dev.loopback = loopback;
  return dev;
}

function parseConnection(raw: unknown, where: string): ConnectionConfig {
  if (!isObject(raw)) throw new Error(`${where}: objet {from, to} attendu`);
  const conn: ConnectionConfig = {
    from: requiredString(raw.from, `${where}.from`),
    to: requiredString(raw.to, `${where}.to`),
  };
  const optional = optionalBoolean(raw.optional, `${where}.optional`);
  if (optional !== undefined) conn.optional = optional;
  return conn;
}

/**
 * Valide un document YAML déjà parsé et applique les valeurs par défaut.
 * @throws Erreur décrivant le premier champ invalide
 */
export function normalizeConfig(raw: unknown): RouterConfig {
  if (raw !== null && raw !== undefined && !isObject(raw)) {
    throw new Error("config: un objet YAML est attendu à la racine");
  }
  const doc: RawObject = isObject(raw) ? raw : {};
  const backend = doc.backend ?? "rtmidi";
  if (backend !== "rtmidi" && backend !== "virtual") {
    throw new Error(`config.backend: "rtmidi" ou "virtual" attendu (reçu ${String(backend)})`);
  }
  const cfg: RouterConfig = {
    backend,
    virtual_devices: listOf(doc.virtual_devices, "config.virtual_devices", parseVirtualDevice),
    connections: listOf(doc.connections, "config.connections", parseConnection),
  };
  if (doc.log_level !== undefined && doc.log_level !== null) {
    const level = typeof doc.log_level === "string" ? doc.log_level.trim().toLowerCase() : doc.log_level;
    if (!isLogLevel(level)) throw new Error(`config.log_level: niveau inconnu (${String(doc.log_level)})`);
    cfg.log_level = level;
  }
  return cfg;
}

/** Parse le texte YAML d'une configuration. */
export function parseConfig(text: string): RouterConfig {
  return normalizeConfig(YAML.parse(text));
}

/**
 * Recherche un fichier de configuration existant parmi les chemins par défaut ou un chemin fourni.
 * @param customPath Chemin explicite à tester en priorité
 * @returns Le chemin trouvé ou null
 */
export async function findConfigPath(customPath?: string): Promise<string | null> {
  const candidates = customPath ? [customPath, ...DEFAULT_PATHS] : DEFAULT_PATHS;
  for (const p of candidates) {
    try {
      await fs.access(p);
      return p;
    } catch {
      // suivant
    }
  }
  return null;
}

/**
 * Charge, parse et valide le fichier YAML de configuration.
 * @param filePath Chemin explicite; sinon, recherche via {@link findConfigPath}
 * @throws Erreur si aucun fichier n'est trouvé ou si le contenu est invalide
 */
export async function loadConfig(filePath?: string): Promise<RouterConfig> {
  const p = await findConfigPath(filePath);
  if (!p) {
    throw new Error("Aucun fichier de configuration trouvé (config.yaml)");
  }
  const raw = await fs.readFile(p, "utf8");
  return parseConfig(raw);
}

/**
 * Observe un fichier de configuration YAML et notifie en cas de modification.
 * @param filePath Chemin du fichier à surveiller
 * @param onChange Callback appelée avec la nouvelle configuration
 * @param onError Callback d'erreur facultative (lecture ou validation)
 * @returns Fonction pour arrêter l'observation
 */
export function watchConfig(
  filePath: string,
  onChange: (cfg: RouterConfig) => void,
  onError?: (err: unknown) => void
): () => void {
  const watcher = chokidar.watch(filePath, { ignoreInitial: true });
  const handler = async (): Promise<void> => {
    try {
      const raw = await fs.readFile(filePath, "utf8");
      onChange(parseConfig(raw));
    } catch (err) {
      onError?.(err);
    }
  };
  watcher.on("change", () => void handler());
  return () => void watcher.close();
}
