import fs from "node:fs";
import path from "node:path";

type Level = "debug" | "info" | "warn" | "error";
export type LogThreshold = Level | "silent";

const levelOrder: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const isLogThreshold = (value: string): value is LogThreshold => value in levelOrder;

const envLevel = process.env.LOG_LEVEL ?? "info";
let minLevel = isLogThreshold(envLevel) ? levelOrder[envLevel] : levelOrder.info;

// stdout carries the ack stream, so log lines never go there
let sink: NodeJS.WritableStream = process.stderr;

const nowIso = () => new Date().toISOString();

const shouldLog = (level: Level) => levelOrder[level] >= minLevel;

const redactString = (value: string): string =>
  value
    .replace(/Bearer\s+[A-Za-z0-9._-]+/g, "Bearer [REDACTED]")
    .replace(/(api[_-]?key\s*[:=]\s*)([^\s"']+)/gi, "$1[REDACTED]")
    .replace(/(token\s*[:=]\s*)([^\s"']+)/gi, "$1[REDACTED]");

const redact = (key: string, value: unknown): unknown => {
  if (["samples", "pcm", "pcm16"].includes(key)) return "[REDACTED_AUDIO]";
  if (typeof value !== "string") return value;
  return redactString(value);
};

const safeJson = (fields: Record<string, unknown>): Record<string, unknown> =>
  JSON.parse(
    JSON.stringify(fields, (k, v) => {
      if (!k) return v;
      return redact(k, v);
    }),
  );

const baseLog = (level: Level, msg: string, fields?: Record<string, unknown>) => {
  if (!shouldLog(level)) return;
  const payload = {
    t: nowIso(),
    level,
    msg,
    ...(fields ? safeJson(fields) : {}),
  };
  sink.write(`${JSON.stringify(payload)}\n`);
};

/**
 * Points the logger at its final destination. `file` of "-" keeps stderr;
 * anything else is opened in append mode, creating parent directories.
 */
export const configureLog = (opts: { level?: LogThreshold; file?: string }) => {
  if (opts.level) minLevel = levelOrder[opts.level];
  if (opts.file && opts.file !== "-") {
    fs.mkdirSync(path.dirname(opts.file), { recursive: true });
    sink = fs.createWriteStream(opts.file, { flags: "a" });
  }
};

/** Resolves once buffered lines reach the log file. */
export const flushLog = (): Promise<void> =>
  new Promise((resolve) => {
    if (sink === process.stderr) {
      resolve();
      return;
    }
    sink.end(() => resolve());
  });

export const errorFields = (err: unknown): Record<string, unknown> =>
  err instanceof Error
    ? { error: err.message, errorName: err.name, stack: err.stack }
    : { error: String(err) };

export const log = {
  debug: (msg: string, fields?: Record<string, unknown>) => baseLog("debug", msg, fields),
  info: (msg: string, fields?: Record<string, unknown>) => baseLog("info", msg, fields),
  warn: (msg: string, fields?: Record<string, unknown>) => baseLog("warn", msg, fields),
  error: (msg: string, fields?: Record<string, unknown>) => baseLog("error", msg, fields),
};
