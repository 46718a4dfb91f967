/**
 * Structured logger.
 *
 * Environment:
 *   ENVRIG_LOG_LEVEL = debug|info|warn|error (default: info)
 *   ENVRIG_LOG_JSON  = 1 for JSONL output (default: text)
 *   ENVRIG_LOG_FILE  = path, entries are appended there as well
 *   ENVRIG_DEBUG     = 1 forces debug level
 */

import fs from "node:fs";
import { errorMessage } from "./errors.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LogEntry {
  ts: string;
  level: LogLevel;
  component: string;
  msg: string;
  data?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function minimumLevel(): number {
  const debug = process.env.ENVRIG_DEBUG;
  if (debug === "1" || debug === "true") return 0;
  const raw = (process.env.ENVRIG_LOG_LEVEL ?? "info").trim().toLowerCase();
  return isLogLevel(raw) ? LEVEL_ORDER[raw] : LEVEL_ORDER.info;
}

let sink: LogSink | null = null;

/** Route entries to `fn` instead of stdout/stderr. */
export function setLogSink(fn: LogSink): void {
  sink = fn;
}

export function resetLogSink(): void {
  sink = null;
}

function format(entry: LogEntry): string {
  if (process.env.ENVRIG_LOG_JSON === "1") {
    return JSON.stringify(entry);
  }
  const prefix = `[${entry.ts}] [${entry.level.toUpperCase().padEnd(5)}] [${entry.component}]`;
  return entry.data ? `${prefix} ${entry.msg} ${JSON.stringify(entry.data)}` : `${prefix} ${entry.msg}`;
}

function emit(level: LogLevel, component: string, msg: string, data?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < minimumLevel()) return;

  const entry: LogEntry = { ts: new Date().toISOString(), level, component, msg };
  if (data) entry.data = data;

  if (sink) {
    sink(entry);
    return;
  }

  const line = format(entry);
  if (level === "warn" || level === "error") {
    process.stderr.write(`${line}\n`);
  } else {
    process.stdout.write(`${line}\n`);
  }

  const file = process.env.ENVRIG_LOG_FILE;
  if (file) {
    try {
      fs.appendFileSync(file, `${line}\n`);
    } catch (error) {
      process.stderr.write(`log file ${file} not writable: ${errorMessage(error)}\n`);
    }
  }
}

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  child(sub: string): Logger;
}

export function createLogger(component: string): Logger {
  return {
    debug: (msg, data) => emit("debug", component, msg, data),
    info: (msg, data) => emit("info", component, msg, data),
    warn: (msg, data) => emit("warn", component, msg, data),
    error: (msg, data) => emit("error", component, msg, data),
    child: (sub) => createLogger(`${component}:${sub}`)
  };
}
