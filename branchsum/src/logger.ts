import { inspect } from "node:util";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFormat = "human" | "jsonl";

export interface LogEntry {
  level: LogLevel;
  message: string;
  component?: string;
  meta?: unknown;
  timestamp?: string;
}

export type LoggerOptions = {
  level: LogLevel;
  format: LogFormat;
  write: (line: string) => void;
};

const LEVEL_ALIASES: Record<string, LogLevel> = { warning: "warn", critical: "error" };

const options: LoggerOptions = {
  level: "info",
  format: "human",
  write: (line) => {
    process.stderr.write(line);
  },
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/** Lower-cased level name with `warning` and `critical` mapped to `warn` and `error`; not checked. */
export function canonicalLevelName(raw: string): string {
  const name = raw.trim().toLowerCase();
  return LEVEL_ALIASES[name] ?? name;
}

/** Accepts the level names plus `warning` and `critical`, in any case. */
export function parseLogLevel(raw: string): LogLevel {
  const level = canonicalLevelName(raw);
  if (!isLogLevel(level)) {
    throw new Error(`log level given: ${raw} -- must be one of: ${[...LOG_LEVELS, ...Object.keys(LEVEL_ALIASES)].join(" | ")}`);
  }
  return level;
}

export function configureLogger(update: Partial<LoggerOptions>): void {
  Object.assign(options, update);
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(options.level);
}

function normalizeMeta(meta: unknown): unknown {
  if (meta === undefined) {
    return undefined;
  }
  if (meta instanceof Error) {
    return { name: meta.name, message: meta.message };
  }

  try {
    JSON.stringify(meta);
    return meta;
  } catch {
    return inspect(meta, { depth: 3, breakLength: 80 });
  }
}

function formatHuman(entry: LogEntry, meta: unknown): string {
  const component = entry.component ? ` [${entry.component}]` : "";
  const suffix = meta === undefined ? "" : ` ${typeof meta === "string" ? meta : JSON.stringify(meta)}`;
  return `${entry.level.toUpperCase()}${component} ${entry.message}${suffix}`;
}

export function log(entry: LogEntry): void {
  if (!enabled(entry.level)) return;

  const meta = normalizeMeta(entry.meta);
  if (options.format === "human") {
    options.write(formatHuman(entry, meta) + "\n");
    return;
  }

  const payload: Record<string, unknown> = {
    level: entry.level,
    message: entry.message,
    timestamp: entry.timestamp ?? new Date().toISOString(),
  };
  if (entry.component) {
    payload.component = entry.component;
  }
  if (meta !== undefined) {
    payload.meta = meta;
  }
  options.write(JSON.stringify(payload) + "\n");
}

export const logger = {
  debug(message: string, component?: string, meta?: unknown): void {
    log({ level: "debug", message, component, meta });
  },
  info(message: string, component?: string, meta?: unknown): void {
    log({ level: "info", message, component, meta });
  },
  warn(message: string, component?: string, meta?: unknown): void {
    log({ level: "warn", message, component, meta });
  },
  error(message: string, component?: string, meta?: unknown): void {
    log({ level: "error", message, component, meta });
  },
};
