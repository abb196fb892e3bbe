import type { LogLevel } from "./config.ts";

export interface EngineLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export const silentLogger: EngineLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function createConsoleLogger(opts: { prefix?: string; level: LogLevel }): EngineLogger {
  const prefix = opts.prefix ?? "[chess-engine]";
  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[opts.level] >= LEVEL_ORDER[level];

  return {
    debug(message) {
      // eslint-disable-next-line no-console
      if (enabled("debug")) console.debug(`${prefix} ${message}`);
    },
    info(message) {
      // eslint-disable-next-line no-console
      if (enabled("info")) console.log(`${prefix} ${message}`);
    },
    warn(message) {
      // eslint-disable-next-line no-console
      if (enabled("warn")) console.warn(`${prefix} ${message}`);
    },
    error(message, err) {
      if (!enabled("error")) return;
      // eslint-disable-next-line no-console
      if (err === undefined) console.error(`${prefix} ${message}`);
      // eslint-disable-next-line no-console
      else console.error(`${prefix} ${message}`, err);
    },
  };
}
