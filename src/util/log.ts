type Level = "debug" | "info" | "warn" | "error";

const levelOrder: Record<Level, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const isLevel = (value: string | undefined): value is Level =>
  value !== undefined && Object.prototype.hasOwnProperty.call(levelOrder, value);

// Read per record so a LOG_LEVEL loaded from .env after this module is still honoured.
const minLevel = (): number => {
  const envLevel = process.env.LOG_LEVEL?.trim().toLowerCase();
  return levelOrder[isLevel(envLevel) ? envLevel : "info"];
};

/** Longest string kept verbatim in log meta; user text can be arbitrarily long. */
export const MAX_LOGGED_STRING = 200;

export type LogWriter = (line: string) => void;

// eslint-disable-next-line no-console
let writeLine: LogWriter = (line) => console.log(line);

/**
 * Redirects log output, e.g. to stderr when stdout carries a CLI's result.
 * Returns the previous writer so callers can put it back.
 */
export const setLogWriter = (writer: LogWriter): LogWriter => {
  const previous = writeLine;
  writeLine = writer;
  return previous;
};

const nowIso = () => new Date().toISOString();

const shouldLog = (level: Level) => levelOrder[level] >= minLevel();

export const redact = (value: unknown): unknown => {
  if (typeof value !== "string") return value;
  const scrubbed = value
    .replace(/Bearer\s+[A-Za-z0-9._-]+/g, "Bearer [REDACTED]")
    .replace(/(api[_-]?key\s*[:=]\s*)([^\s"']+)/gi, "$1[REDACTED]")
    .replace(/(token\s*[:=]\s*)([^\s"']+)/gi, "$1[REDACTED]");
  if (scrubbed.length <= MAX_LOGGED_STRING) return scrubbed;
  return scrubbed.slice(0, MAX_LOGGED_STRING) + "…";
};

const baseLog = (level: Level, msg: string, meta?: Record<string, unknown>) => {
  if (!shouldLog(level)) return;
  const payload = {
    t: nowIso(),
    level,
    msg,
    ...(meta ? { meta: JSON.parse(JSON.stringify(meta, (_k, v) => redact(v))) } : {}),
  };
  writeLine(JSON.stringify(payload));
};

export const log = {
  debug: (msg: string, meta?: Record<string, unknown>) => baseLog("debug", msg, meta),
  info: (msg: string, meta?: Record<string, unknown>) => baseLog("info", msg, meta),
  warn: (msg: string, meta?: Record<string, unknown>) => baseLog("warn", msg, meta),
  error: (msg: string, meta?: Record<string, unknown>) => baseLog("error", msg, meta),
};

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
