import fs from 'fs';
import path from 'path';
import { toErrorPayload } from '../shared/errors.js';

type Fields = Record<string, unknown>;
type Level = 'debug' | 'info' | 'warn' | 'error';

type Destination =
  | { kind: 'console' }
  | { kind: 'file'; file: string };

let destination: Destination = { kind: 'console' };

const LEVEL_RANK: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLevel(value: string | undefined): value is Level {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

const envLevel = process.env.LOG_LEVEL;
let minLevel: Level = isLevel(envLevel) ? envLevel : 'info';

function writeConsole(level: Level, line: string) {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

function write(level: Level, line: string) {
  if (destination.kind === 'console') return writeConsole(level, line);
  const { file } = destination;
  try {
    fs.appendFileSync(file, line + '\n', 'utf8');
  } catch (err) {
    // A failing log file never takes the caller down with it
    destination = { kind: 'console' };
    writeConsole('warn', JSON.stringify({ level: 'warn', time: new Date().toISOString(), file, err: toErrorPayload(err), msg: 'log_file_unwritable' }));
    writeConsole(level, line);
  }
}

function emit(level: Level, msg?: string, fields?: Fields) {
  if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return;
  const payload: Fields = {
    level,
    time: new Date().toISOString(),
    ...(fields || {}),
    msg: msg || fields?.msg || '',
  };
  // Normalize embedded error if present
  if (fields?.err !== undefined) {
    payload.err = toErrorPayload(fields.err);
  }
  write(level, JSON.stringify(payload));
}

function log(level: Level, arg1?: string | Fields, arg2?: string) {
  if (typeof arg1 === 'string') return emit(level, arg1);
  emit(level, arg2, arg1 || {});
}

export const logger = {
  info(arg1?: string | Fields, arg2?: string) { log('info', arg1, arg2); },
  warn(arg1?: string | Fields, arg2?: string) { log('warn', arg1, arg2); },
  error(arg1?: string | (Fields & { err?: unknown }), arg2?: string) { log('error', arg1, arg2); },
  debug(arg1?: string | Fields, arg2?: string) { log('debug', arg1, arg2); },
};

/**
 * Send log lines to a file; stdout belongs to the dashboard while it runs.
 * Stays on the console when the file's directory cannot be created.
 */
export function logToFile(file: string): boolean {
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
  } catch (err) {
    logger.warn({ file, err }, 'log_file_unwritable');
    return false;
  }
  destination = { kind: 'file', file };
  return true;
}

export function logToConsole() {
  destination = { kind: 'console' };
}

/** Lines below this level are dropped. */
export function setLogLevel(level: Level) {
  minLevel = level;
}

export type { Fields, Level };
