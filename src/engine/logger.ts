export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
}

export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {},
};

/** Console logger; debug output is only written when `debug` is on. */
export function createLogger(debug = false): Logger {
  return {
    debug: (message) => {
      if (debug) console.debug(message);
    },
    warn: (message) => console.warn(message),
  };
}
