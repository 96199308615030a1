/**
 * Portal SDK - Logging
 *
 * The client traces requests through a Logger. Nothing is printed unless a
 * logger is supplied.
 */

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export function consoleLogger(tag: string = 'PortalClient'): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (message, context) =>
      context ? console.debug(`${prefix} ${message}`, context) : console.debug(`${prefix} ${message}`),
    warn: (message, context) =>
      context ? console.warn(`${prefix} ${message}`, context) : console.warn(`${prefix} ${message}`),
    error: (message, context) =>
      context ? console.error(`${prefix} ${message}`, context) : console.error(`${prefix} ${message}`),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {},
  error: () => {},
};
