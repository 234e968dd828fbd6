export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  readonly scope: string;
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string, error?: unknown) => void;
  child: (scope: string) => Logger;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);

let overrideLevel: LogLevel | null = null;

export const setLogLevel = (level: LogLevel | null) => {
  overrideLevel = level;
};

export const getLogLevel = (): LogLevel => {
  if (overrideLevel) {
    return overrideLevel;
  }
  const envLevel = process.env.LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(envLevel) ? envLevel : "info";
};

const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[getLogLevel()];

const describeError = (error: unknown) => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};

export const createLogger = (scope: string): Logger => {
  const prefix = `[${scope}]`;
  return {
    scope,
    debug: (message) => {
      if (enabled("debug")) {
        console.log(`${prefix} ${message}`);
      }
    },
    info: (message) => {
      if (enabled("info")) {
        console.log(`${prefix} ${message}`);
      }
    },
    warn: (message) => {
      if (enabled("warn")) {
        console.warn(`${prefix} ${message}`);
      }
    },
    error: (message, error) => {
      if (!enabled("error")) {
        return;
      }
      if (error === undefined) {
        console.error(`${prefix} ${message}`);
        return;
      }
      console.error(`${prefix} ${message}: ${describeError(error)}`);
    },
    child: (sub) => createLogger(`${scope}:${sub}`),
  };
};
