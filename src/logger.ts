import process from "node:process";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const PREFIX = "[mdlive]";

let currentLevel: LogLevel = process.env.MDLIVE_DEBUG ? "debug" : "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

// Startup lines (`Watching …`, `Preview available at …`) go through `info`
// unprefixed so they read like the usage banner.
export const log = {
  debug(message: string, ...details: unknown[]): void {
    if (enabled("debug")) {
      console.debug(`${PREFIX} ${message}`, ...details);
    }
  },
  info(message: string, ...details: unknown[]): void {
    if (enabled("info")) {
      console.log(message, ...details);
    }
  },
  warn(message: string, ...details: unknown[]): void {
    if (enabled("warn")) {
      console.warn(`${PREFIX} ${message}`, ...details);
    }
  },
  error(message: string, ...details: unknown[]): void {
    if (enabled("error")) {
      console.error(`${PREFIX} ${message}`, ...details);
    }
  },
};
