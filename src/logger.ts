// Speaker Match - Logging
// Console-backed logger shared by the server, service, matcher and scorer.
// Components take a Logger so tests can pass vi.fn() spies instead.

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const ts = () => new Date().toISOString();

/**
 * Creates a console logger. Lines look like
 * `[INFO] [2025-01-01T00:00:00.000Z] [SpeakerMatcher] message`.
 */
export function createConsoleLogger(scope?: string): Logger {
  const prefix = (level: string) =>
    scope ? `[${level}] [${ts()}] [${scope}]` : `[${level}] [${ts()}]`;

  return {
    info: (msg, ...args) => console.log(`${prefix("INFO")} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`${prefix("WARN")} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`${prefix("ERROR")} ${msg}`, ...args),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
