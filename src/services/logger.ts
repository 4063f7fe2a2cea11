import { LogLevel } from "../config";

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = "info";

/**
 * Set the minimum level written to the console
 */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function enabled(level: LogLevel): boolean {
  return SEVERITY[level] >= SEVERITY[threshold];
}

export const logger = {
  debug(message: string, ...args: unknown[]): void {
    if (enabled("debug")) console.log(message, ...args);
  },
  info(message: string, ...args: unknown[]): void {
    if (enabled("info")) console.log(message, ...args);
  },
  warn(message: string, ...args: unknown[]): void {
    if (enabled("warn")) console.warn(message, ...args);
  },
  error(message: string, ...args: unknown[]): void {
    if (enabled("error")) console.error(message, ...args);
  },
};
