/**
 * Logging
 * Same shape as the Trigger.dev task logger so either can be passed around.
 */

export interface Logger {
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, metadata?: Record<string, unknown>): void;
}

type Level = 'INFO' | 'WARN' | 'ERROR';

function formatLog(level: Level, message: string, metadata?: Record<string, unknown>): string {
  const metadataStr = metadata && Object.keys(metadata).length > 0
    ? ` ${JSON.stringify(metadata)}`
    : '';
  return `[${new Date().toISOString()}] ${level}: ${message}${metadataStr}`;
}

export const consoleLogger: Logger = {
  info(message, metadata) {
    console.log(formatLog('INFO', message, metadata));
  },
  warn(message, metadata) {
    console.warn(formatLog('WARN', message, metadata));
  },
  error(message, metadata) {
    console.error(formatLog('ERROR', message, metadata));
  },
};

export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
};

/** Flatten an unknown thrown value into loggable metadata. */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { error: String(error) };
}
