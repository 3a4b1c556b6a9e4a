/**
 * Diagnostics for settings documents.
 *
 * Messages go to the console prefixed with the component name,
 * e.g. `[SettingsDocument] Settings file is empty`. Callers can inject
 * their own logger through the document options.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Console-backed logger. Debug output only appears when
 * `SEALED_SETTINGS_DEBUG` is set.
 */
export function createConsoleLogger(scope: string): Logger {
  const prefix = `[${scope}]`;

  return {
    debug(message) {
      if (process.env.SEALED_SETTINGS_DEBUG) {
        console.debug(`${prefix} ${message}`);
      }
    },
    info(message) {
      console.log(`${prefix} ${message}`);
    },
    warn(message) {
      console.warn(`${prefix} ${message}`);
    },
    error(message) {
      console.error(`${prefix} ${message}`);
    },
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
