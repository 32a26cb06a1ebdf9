/**
 * Component logger for the RCON decoder.
 *
 * - Plain text or JSON lines (RCON_LOG_JSON=1)
 * - Level from RCON_LOG_LEVEL, default INFO
 * - Optional file sink via RCON_LOG_FILE
 */

import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LogEntry {
  ts: string;
  level: LogLevel;
  component: string;
  msg: string;
  [key: string]: unknown;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

// Env is read on every call so tests and embedding apps can change it late
function getLogFile(): string | undefined {
  return process.env.RCON_LOG_FILE;
}

function getLogLevel(): LogLevel {
  const level = (process.env.RCON_LOG_LEVEL ?? 'INFO').toUpperCase();
  return isLogLevel(level) ? level : 'INFO';
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

function isLogJson(): boolean {
  return process.env.RCON_LOG_JSON === '1';
}

export function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[getLogLevel()];
}

function formatFields(fields: Record<string, unknown>): string {
  return Object.entries(fields)
    .map(([key, value]) => ` ${key}=${value}`)
    .join('');
}

export function formatMessage(entry: LogEntry): string {
  if (isLogJson()) {
    return JSON.stringify(entry);
  }
  const { ts, level, component, msg, ...fields } = entry;
  return `${ts} [${level}] [${component}] ${msg}${formatFields(fields)}`;
}

type LogSink = (level: LogLevel, line: string) => void;

const preparedDirs = new Set<string>();

function fileSink(logFile: string): LogSink {
  const dir = path.dirname(logFile);
  if (!preparedDirs.has(dir)) {
    fs.mkdirSync(dir, { recursive: true });
    preparedDirs.add(dir);
  }
  return (_level, line) => fs.appendFileSync(logFile, `${line}\n`);
}

// WARN and above to stderr
const consoleSink: LogSink = (level, line) => {
  if (LEVEL_PRIORITY[level] >= LEVEL_PRIORITY.WARN) {
    console.error(line);
  } else {
    console.log(line);
  }
};

function currentSink(): LogSink {
  const logFile = getLogFile();
  return logFile ? fileSink(logFile) : consoleSink;
}

function log(level: LogLevel, component: string, msg: string, extra?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const line = formatMessage({
    ts: new Date().toISOString(),
    level,
    component,
    msg,
    ...extra,
  });
  currentSink()(level, line);
}

export interface Logger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
  /** True when DEBUG lines would be written; guards costly field formatting. */
  isDebugEnabled(): boolean;
}

/**
 * Create a logger for a specific component.
 * @param component - Component name (e.g., 'decoder', 'stream')
 */
export function createLogger(component: string): Logger {
  return {
    debug: (msg, extra) => log('DEBUG', component, msg, extra),
    info: (msg, extra) => log('INFO', component, msg, extra),
    warn: (msg, extra) => log('WARN', component, msg, extra),
    error: (msg, extra) => log('ERROR', component, msg, extra),
    isDebugEnabled: () => shouldLog('DEBUG'),
  };
}

export const decoderLog = createLogger('decoder');
export const streamLog = createLogger('stream');
