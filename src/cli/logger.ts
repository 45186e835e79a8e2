import path from 'node:path';
import pino from 'pino';
import type { Level, Logger } from 'pino';
import { ui } from './ui.js';
import { isTestEnv } from '../util/env.js';

export type LogLevel = Level | 'silent';
type Data = Record<string, unknown>;

export const LOG_FILE = path.resolve('logs', 'app.ndjson');

/**
 * Opens `dest` synchronously, so a directory that cannot be created or a file
 * that cannot be opened fails here. Returns null then; the game runs without
 * a log file.
 */
export function openLogFile(dest: string, level: string = process.env.LOG_LEVEL || 'info'): Logger | null {
  try {
    const stream = pino.destination({ dest, mkdir: true, sync: true });
    return pino({ level, base: undefined }, stream);
  } catch {
    return null;
  }
}

const fileLogger = isTestEnv() ? null : openLogFile(LOG_FILE);
const logger = fileLogger ?? pino({ level: 'silent' });

function setLevel(level: LogLevel) {
  if (fileLogger) fileLogger.level = level;
}

function info(msg: string, scope?: string, data?: Data) {
  logger.info({ msg, ts: Date.now(), scope, data });
}
function warn(msg: string, scope?: string, data?: Data) {
  ui.say(msg, 'warn');
  logger.warn({ msg, ts: Date.now(), scope, data });
}
function error(msg: string, scope?: string, data?: Data) {
  ui.say(msg, 'error');
  logger.error({ msg, ts: Date.now(), scope, data });
}
function debug(msg: string, scope?: string, data?: Data) {
  if (logger.level === 'debug') ui.say(msg, 'dim');
  logger.debug({ msg, ts: Date.now(), scope, data });
}

export type ScopedLog = {
  info: (msg: string, data?: Data) => void;
  warn: (msg: string, data?: Data) => void;
  error: (msg: string, data?: Data) => void;
  debug: (msg: string, data?: Data) => void;
};

function withScope(scope: string): ScopedLog {
  return {
    info: (msg, data) => info(msg, scope, data),
    warn: (msg, data) => warn(msg, scope, data),
    error: (msg, data) => error(msg, scope, data),
    debug: (msg, data) => debug(msg, scope, data),
  };
}

export const log = { info, warn, error, debug, withScope, setLevel };
export default log;
