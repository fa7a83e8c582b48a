import chalk from "chalk";

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";

interface LevelStyle {
  rank: number;
  paint: (line: string) => string;
  write: (line: string) => void;
}

const levels: Record<LogLevel, LevelStyle> = {
  error: { rank: 0, paint: (l) => chalk.red.bold(l), write: (l) => console.error(l) },
  warn: { rank: 1, paint: (l) => chalk.yellow(l), write: (l) => console.warn(l) },
  info: { rank: 2, paint: (l) => chalk.cyan(l), write: (l) => console.log(l) },
  debug: { rank: 3, paint: (l) => chalk.gray(l), write: (l) => console.log(l) },
  trace: { rank: 4, paint: (l) => chalk.magenta(l), write: (l) => console.log(l) },
};

/** Indique si une chaîne quelconque (env, YAML) est un niveau de log connu. */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(levels, value);
}

/** Niveau à partir d'une valeur brute; repli sur `fallback` si inconnue. */
export function parseLogLevel(value: unknown, fallback: LogLevel = "info"): LogLevel {
  const v = typeof value === "string" ? value.trim().toLowerCase() : value;
  return isLogLevel(v) ? v : fallback;
}

let threshold: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function render(value: unknown): string {
  if (value instanceof Error) return value.stack ?? `${value.name}: ${value.message}`;
  return String(value);
}

type LogFn = (message: unknown, ...args: unknown[]) => void;

export interface Logger extends Record<LogLevel, LogFn> {
  /** Logger préfixé par `[scope]`; les portées s'emboîtent (`[a:b]`). */
  child(scope: string): Logger;
}

function emitter(level: LogLevel, scope: string | undefined): LogFn {
  const style = levels[level];
  return (message, ...args) => {
    if (style.rank > levels[threshold].rank) return;
    const head = `[${new Date().toISOString()}] [${level.toUpperCase()}]${scope ? ` [${scope}]` : ""}`;
    const body = [message, ...args].map(render).join(" ");
    style.write(style.paint(`${head} ${body}`));
  };
}

export function createLogger(scope?: string): Logger {
  return {
    error: emitter("error", scope),
    warn: emitter("warn", scope),
    info: emitter("info", scope),
    debug: emitter("debug", scope),
    trace: emitter("trace", scope),
    child: (sub) => createLogger(scope ? `${scope}:${sub}` : sub),
  };
}

export const logger: Logger = createLogger();
