export interface DalDebugLogger {
  db: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

const silentLogger: DalDebugLogger = {
  db: () => undefined,
  error: () => undefined,
};

let debugLogger: DalDebugLogger = silentLogger;

export const debug = {
  db: (...args: unknown[]) => {
    debugLogger.db(...args);
  },
  error: (...args: unknown[]) => {
    debugLogger.error(...args);
  },
};

export const setDebugLogger = (logger: DalDebugLogger): void => {
  debugLogger = logger;
};

export const resetDebugLogger = (): void => {
  debugLogger = silentLogger;
};

/**
 * Format an unknown thrown value for log output.
 */
export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
