/**
 * Minimal logging seam. Production code logs to the console with a bracketed
 * component tag; tests pass silentLogger.
 *
 * Never pass secrets, nonces, challenges or responses to a logger.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

export function consoleLogger(component: string): Logger {
  const tag = `[${component}]`;
  return {
    debug: (message) => console.debug(`${tag} ${message}`),
    info: (message) => console.log(`${tag} ${message}`),
    warn: (message) => console.warn(`${tag} ${message}`),
    error: (message, err) => {
      if (err === undefined) console.error(`${tag} ${message}`);
      else console.error(`${tag} ${message}`, err);
    },
  };
}

const noop = (): void => undefined;

export const silentLogger: Logger = { debug: noop, info: noop, warn: noop, error: noop };
