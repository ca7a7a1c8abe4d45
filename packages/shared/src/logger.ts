export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
}

// Everything goes to stderr: stdout carries protocol frames in piped mode.
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const tag = `[${scope}]`;
  return {
    debug(message) {
      if (options.verbose) console.error(`${tag} ${message}`);
    },
    info(message) {
      console.error(`${tag} ${message}`);
    },
    warn(message) {
      console.error(`${tag} warning: ${message}`);
    },
    error(message) {
      console.error(`${tag} error: ${message}`);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
