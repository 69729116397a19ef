// Arm Angle Pipeline - Logging

export interface PipelineLogger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/** Console-backed logger printing `[LEVEL] [Component] message`. */
export function createConsoleLogger(component: string): PipelineLogger {
  return {
    info: (msg, ...args) => console.log(`[INFO] [${component}] ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[WARN] [${component}] ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[ERROR] [${component}] ${msg}`, ...args),
  };
}

export const silentLogger: PipelineLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
