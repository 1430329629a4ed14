// Console logging shared by every component.
// Lines read "[LEVEL] [Component] message" so interleaved output stays greppable.

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function createLogger(component: string): Logger {
  return {
    info: (msg, ...args) => console.log(`[INFO] [${component}] ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[WARN] [${component}] ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[ERROR] [${component}] ${msg}`, ...args),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
