/**
 * Minimal logger for Colloquy, zero dependencies.
 *
 * Two output channels:
 *  1. stderr (console.error), level from setLogLevel() or COLLOQUY_LOG_LEVEL
 *  2. Log files (<dataDir>/logs/), active once initFileLogging() is called
 *     - info.log            : global, info level+, append
 *     - sessions/<id>.log   : one per debate session, all levels, full prompts/responses
 *
 * Purge strategies (configurable per channel in colloquy.config.json):
 *  - info.log  : "date" (max days) or "size" (max bytes, drops oldest lines)
 *  - sessions/ : "count" (keep N newest), "date" (max days), or "size" (max total bytes)
 *
 * stdout is left to the host application; everything here goes to stderr.
 */

import {
  appendFileSync, readFileSync, writeFileSync,
  mkdirSync, statSync, readdirSync, unlinkSync,
} from "node:fs";
import { join } from "node:path";

export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVELS: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };
const LEVEL_TAGS: Record<LogLevel, string> = { error: "ERR", warn: "WRN", info: "INF", debug: "DBG" };

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value === "error" || value === "warn" || value === "info" || value === "debug";
}

// ── stderr level ────────────────────────────────────────────────────────

const envLevel = process.env.COLLOQUY_LOG_LEVEL;
let stderrLevel: number = isLogLevel(envLevel) ? LEVELS[envLevel] : LEVELS.warn;

export function setLogLevel(l: LogLevel): void {
  stderrLevel = LEVELS[l];
}

export function getLogLevel(): LogLevel {
  const order: LogLevel[] = ["error", "warn", "info", "debug"];
  return order.find((k) => LEVELS[k] === stderrLevel) ?? "warn";
}

// ── File logging config ─────────────────────────────────────────────────

export interface FileLoggingConfig {
  info?: {
    purge?: "date" | "size";
    maxDays?: number;
    maxBytes?: number;
  };
  sessions?: {
    purge?: "count" | "date" | "size";
    maxFiles?: number;
    maxDays?: number;
    maxBytes?: number;
  };
}

interface ResolvedFileConfig {
  logsDir: string;
  sessionsDir: string;
  infoLogPath: string;
  info: { purge: "date" | "size"; maxDays: number; maxBytes: number };
  sessions: { purge: "count" | "date" | "size"; maxFiles: number; maxDays: number; maxBytes: number };
}

let fileCfg: ResolvedFileConfig | null = null;

/**
 * Initialize file logging. Call once at startup.
 * @param dataDir  Base data directory (see getUserDataDir)
 */
export function initFileLogging(dataDir: string, config?: FileLoggingConfig): void {
  const logsDir = join(dataDir, "logs");
  const sessionsDir = join(logsDir, "sessions");

  fileCfg = {
    logsDir,
    sessionsDir,
    infoLogPath: join(logsDir, "info.log"),
    info: {
      purge: config?.info?.purge ?? "date",
      maxDays: config?.info?.maxDays ?? 30,
      maxBytes: config?.info?.maxBytes ?? 50 * 1024 * 1024,
    },
    sessions: {
      purge: config?.sessions?.purge ?? "count",
      maxFiles: config?.sessions?.maxFiles ?? 50,
      maxDays: config?.sessions?.maxDays ?? 14,
      maxBytes: config?.sessions?.maxBytes ?? 100 * 1024 * 1024,
    },
  };

  mkdirSync(sessionsDir, { recursive: true });

  purgeInfoLog(fileCfg);
  purgeSessionLogs(fileCfg);
}

/** Stop writing to files (tests, or a host that tears the library down). */
export function disableFileLogging(): void {
  fileCfg = null;
}

// ── Formatting ──────────────────────────────────────────────────────────

function ts(): string {
  return new Date().toISOString().slice(11, 23);
}

/** Truncate a string for display. Full content goes to session log files. */
export function truncate(s: string, maxLen = 500): string {
  if (s.length <= maxLen) return s;
  return s.slice(0, maxLen) + `... (${s.length} chars total)`;
}

function formatArgs(args: unknown[]): string {
  return args
    .map((a) => {
      if (typeof a === "string") return a;
      if (a instanceof Error) return a.message;
      return JSON.stringify(a);
    })
    .join(" ");
}

// File writes never throw into the caller.
function appendLine(path: string, line: string): void {
  try {
    appendFileSync(path, line);
  } catch (err) {
    if (stderrLevel >= LEVELS.debug) {
      console.error(ts(), LEVEL_TAGS.debug, "[logger]", `append to ${path} failed: ${formatArgs([err])}`);
    }
  }
}

// ── Core log function (stderr + info.log) ───────────────────────────────

const STDERR_MAX_LINE = 800;

function write(level: LogLevel, tag: string, args: unknown[]): void {
  const lvl = LEVELS[level];
  const message = formatArgs(args);

  if (stderrLevel >= lvl) {
    const short = message.length > STDERR_MAX_LINE
      ? message.slice(0, STDERR_MAX_LINE) + `... (${message.length} chars, full in session log)`
      : message;
    console.error(ts(), LEVEL_TAGS[level], tag, short);
  }

  if (fileCfg && lvl <= LEVELS.info) {
    appendLine(fileCfg.infoLogPath, `${new Date().toISOString()} ${LEVEL_TAGS[level]} ${tag} ${message}\n`);
  }
}

// ── Per-session log ─────────────────────────────────────────────────────

export interface SessionLog {
  /** Write a line to the session log file (with timestamp). */
  write: (level: LogLevel, message: string) => void;
  /** Absolute path to this session's log file. */
  readonly path: string;
}

const SAFE_SESSION_ID = /^[a-zA-Z0-9_-]+$/;

export function isValidSessionId(sessionId: string): boolean {
  return SAFE_SESSION_ID.test(sessionId) && sessionId.length <= 128;
}

/**
 * Create a per-session log file: <dataDir>/logs/sessions/<sessionId>.log
 * Returns null while file logging is off.
 */
export function createSessionLog(sessionId: string): SessionLog | null {
  if (!fileCfg) return null;
  if (!isValidSessionId(sessionId)) {
    write("warn", "[logger]", [`Invalid session id for log file (rejected): ${sessionId}`]);
    return null;
  }

  const path = join(fileCfg.sessionsDir, `${sessionId}.log`);
  return {
    write(level: LogLevel, message: string): void {
      appendLine(path, `${new Date().toISOString()} ${LEVEL_TAGS[level]} ${message}\n`);
    },
    path,
  };
}

// ── Purge: info.log ─────────────────────────────────────────────────────

function readIfExists(path: string): string | null {
  try {
    return readFileSync(path, "utf-8");
  } catch {
    return null;
  }
}

function purgeInfoLog(cfg: ResolvedFileConfig): void {
  const content = readIfExists(cfg.infoLogPath);
  if (content === null) return;

  if (cfg.info.purge === "date") {
    const cutoff = new Date(Date.now() - cfg.info.maxDays * 24 * 60 * 60 * 1000).toISOString();
    const kept = content.split("\n").filter((line) => line.trim() === "" || line.slice(0, 24) >= cutoff);
    writeFileSync(cfg.infoLogPath, kept.join("\n"));
    return;
  }

  if (Buffer.byteLength(content) <= cfg.info.maxBytes) return;
  const trimmed = content.slice(content.length - cfg.info.maxBytes);
  const firstNewline = trimmed.indexOf("\n");
  writeFileSync(cfg.infoLogPath, firstNewline >= 0 ? trimmed.slice(firstNewline + 1) : trimmed);
}

// ── Purge: session logs ─────────────────────────────────────────────────

interface SessionFileInfo {
  path: string;
  size: number;
  mtimeMs: number;
}

function listSessionFiles(dir: string): SessionFileInfo[] {
  let names: string[];
  try {
    names = readdirSync(dir);
  } catch {
    return [];
  }
  return names
    .filter((f) => f.endsWith(".log"))
    .map((name) => {
      const path = join(dir, name);
      const stats = statSync(path);
      return { path, size: stats.size, mtimeMs: stats.mtimeMs };
    })
    .sort((a, b) => b.mtimeMs - a.mtimeMs); // newest first
}

function removeFile(path: string): void {
  try {
    unlinkSync(path);
  } catch (err) {
    write("debug", "[logger]", [`purge of ${path} failed:`, err]);
  }
}

function purgeSessionLogs(cfg: ResolvedFileConfig): void {
  const files = listSessionFiles(cfg.sessionsDir);
  const { purge, maxFiles, maxDays, maxBytes } = cfg.sessions;

  switch (purge) {
    case "count":
      files.slice(maxFiles).forEach((f) => removeFile(f.path));
      break;
    case "date": {
      const cutoff = Date.now() - maxDays * 24 * 60 * 60 * 1000;
      files.filter((f) => f.mtimeMs < cutoff).forEach((f) => removeFile(f.path));
      break;
    }
    case "size": {
      let total = 0;
      for (const file of files) {
        total += file.size;
        if (total > maxBytes) removeFile(file.path);
      }
      break;
    }
  }
}

// ── Logger factory ──────────────────────────────────────────────────────

export interface Logger {
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

export function createLogger(namespace: string): Logger {
  const tag = `[${namespace}]`;
  return {
    error: (...args: unknown[]) => write("error", tag, args),
    warn: (...args: unknown[]) => write("warn", tag, args),
    info: (...args: unknown[]) => write("info", tag, args),
    debug: (...args: unknown[]) => write("debug", tag, args),
  };
}
