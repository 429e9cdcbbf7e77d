import type { LogLevel } from '../types/config.types.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const PREFIX = '[code-atlas]';

let threshold: LogLevel = 'info';

/** Applied once at startup from `config.logLevel`. */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

// stdout belongs to command output and the MCP stdio transport
function write(level: LogLevel, message: string): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  const tag = level === 'info' ? '' : `${level.toUpperCase()} `;
  process.stderr.write(`${PREFIX} ${tag}${message}\n`);
}

export const logger = {
  debug: (message: string): void => write('debug', message),
  info: (message: string): void => write('info', message),
  warn: (message: string): void => write('warn', message),
  error: (message: string): void => write('error', message),
};
