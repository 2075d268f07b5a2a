export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const PREFIX = "[sweeper-brain]";

export function createConsoleLogger(level: LogLevel = "warn"): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= threshold;
  return {
    debug: (message) => {
      if (enabled("debug")) console.debug(`${PREFIX} ${message}`);
    },
    info: (message) => {
      if (enabled("info")) console.info(`${PREFIX} ${message}`);
    },
    warn: (message) => {
      if (enabled("warn")) console.warn(`${PREFIX} ${message}`);
    },
    error: (message) => {
      if (enabled("error")) console.error(`${PREFIX} ${message}`);
    },
  };
}

export const silentLogger: Logger = createConsoleLogger("silent");
