import pino from 'pino';
import type { Logger, TransportTargetOptions } from 'pino';

export type { Logger };

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const LOG_FORMAT = process.env.LOG_FORMAT || 'auto';
const LOG_TIMEZONE = process.env.LOG_TIMEZONE || 'America/Bogota';
const isDevelopment = process.env.NODE_ENV === 'development';

function usePrettyLogging(): boolean {
  if (LOG_FORMAT === 'json') return false;
  if (LOG_FORMAT === 'pretty') return true;
  return isDevelopment;
}

// Store audits are read in local wall-clock time
function localTimestamp(): string {
  const time = new Date().toLocaleString('es-CO', {
    timeZone: LOG_TIMEZONE,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  });
  return `,"time":"${time}"`;
}

function prettyTargets(level: string): TransportTargetOptions[] {
  const terminal: TransportTargetOptions = {
    target: 'pino-pretty',
    level,
    options: { colorize: true, translateTime: 'SYS:yyyy-mm-dd HH:MM:ss o', levelFirst: true, ignore: 'pid,hostname', messageFormat: '{msg}' },
  };
  if (!isDevelopment) return [terminal];

  return [
    terminal,
    {
      target: 'pino-pretty',
      level,
      options: { destination: './debug.log', colorize: false, translateTime: 'SYS:yyyy-mm-dd HH:MM:ss o', levelFirst: true, ignore: 'pid,hostname' },
    },
  ];
}

function createLogger(level: string = LOG_LEVEL): Logger {
  return pino({
    level,
    base: { service: 'inventory-photo-collector' },
    redact: ['headers.authorization', 'headers["x-hub-signature-256"]'],
    timestamp: localTimestamp,
    transport: usePrettyLogging() ? { targets: prettyTargets(level) } : undefined,
  });
}

export const logger: Logger = createLogger();

/** Logger that drops everything; handy for tests. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
