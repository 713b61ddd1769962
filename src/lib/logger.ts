export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFormat = "pretty" | "json";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;

  /**
   * Returns a logger that adds `fields` to every entry.
   */
  child(fields: LogFields): Logger;
}

export interface CreateLoggerOptions {
  /**
   * Minimum level to emit.
   */
  level?: LogLevel;

  /**
   * Output format.
   */
  format?: LogFormat;

  /**
   * Line sink. Defaults to console.log / console.error (warn and error go to stderr).
   */
  write?: (line: string, lvl: LogLevel) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const SECRET_KEY_PATTERN = /secret|token|password|authorization|credential/i;
const BEARER_PATTERN = /Bearer\s+[A-Za-z0-9._~+/=-]+/g;

export const REDACTED = "[redacted]";

function shouldLog(min: LogLevel, lvl: LogLevel): boolean {
  return LEVEL_ORDER[lvl] >= LEVEL_ORDER[min];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

/**
 * Masks values stored under secret-looking keys and bearer tokens inside strings.
 */
export function redactFields(value: unknown): unknown {
  if (typeof value === "string") {
    return value.replace(BEARER_PATTERN, `Bearer ${REDACTED}`);
  }
  if (Array.isArray(value)) {
    return value.map(redactFields);
  }
  if (!isRecord(value)) {
    return value;
  }
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = SECRET_KEY_PATTERN.test(k) && v !== undefined && v !== null ? REDACTED : redactFields(v);
  }
  return out;
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return "\"<unstringifiable>\"";
  }
}

function defaultWrite(line: string, lvl: LogLevel): void {
  if (lvl === "warn" || lvl === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Creates a small structured logger for CLI + CI usage.
 *
 * Defaults: level "info", format "pretty".
 */
export function createLogger(options: CreateLoggerOptions = {}, bound: LogFields = {}): Logger {
  const level = options.level ?? "info";
  const format = options.format ?? "pretty";
  const write = options.write ?? defaultWrite;

  const emit = (lvl: LogLevel, message: string, fields?: LogFields): void => {
    if (!shouldLog(level, lvl)) return;

    const merged = { ...bound, ...(fields ?? {}) };
    const redacted = redactFields(merged);
    const payload = isRecord(redacted) ? redacted : {};
    const msg = String(redactFields(message));

    if (format === "json") {
      write(safeStringify({ ts: new Date().toISOString(), level: lvl, msg, ...payload }), lvl);
      return;
    }

    const suffix = Object.keys(payload).length ? ` ${safeStringify(payload)}` : "";
    write(`[${lvl}] ${msg}${suffix}`, lvl);
  };

  return {
    debug: (m, f) => emit("debug", m, f),
    info: (m, f) => emit("info", m, f),
    warn: (m, f) => emit("warn", m, f),
    error: (m, f) => emit("error", m, f),
    child: (fields) => createLogger(options, { ...bound, ...fields })
  };
}

/**
 * Logger that drops everything. Used when callers pass none.
 */
export function createSilentLogger(): Logger {
  const noop = (): void => undefined;
  const silent: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => silent
  };
  return silent;
}
