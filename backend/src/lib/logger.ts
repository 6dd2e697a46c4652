export type Logger = Readonly<{
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}>;

const PREFIX = "[SmsGateway]";

export function createConsoleLogger(options: Readonly<{ debug?: boolean }> = {}): Logger {
  const debugEnabled = options.debug === true;
  return {
    info(message: string): void {
      console.log(`${PREFIX} ${message}`);
    },
    warn(message: string): void {
      console.warn(`${PREFIX} ${message}`);
    },
    error(message: string): void {
      console.error(`${PREFIX} ${message}`);
    },
    debug(message: string): void {
      if (!debugEnabled) return;
      console.debug(`${PREFIX} ${message}`);
    }
  };
}

/** Discards everything. Used by tests and as the default for optional logger deps. */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {}
};

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
