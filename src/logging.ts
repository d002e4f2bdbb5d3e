import { normalizeMeta, serializeError } from "./utils";

export type Logger = {
  error: (message: string, meta?: Record<string, unknown>) => void;
  warn?: (message: string, meta?: Record<string, unknown>) => void;
  info?: (message: string, meta?: Record<string, unknown>) => void;
  debug?: (message: string, meta?: Record<string, unknown>) => void;
};

export type SafeLogger = Required<Logger>;

export type RequestLogEvent = {
  path: string;
  method: string;
  durationMs?: number;
  status?: number;
  outcome: "success" | "fail";
  error?: ReturnType<typeof serializeError>;
};

export type RequestLogger = (event: RequestLogEvent) => void;

export const noopLogger: SafeLogger = {
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
};

type LogLevel = keyof Logger;
type LogFn = (message: string, meta?: Record<string, unknown>) => void;

export const createSafeLogger = (logger: Logger = noopLogger): SafeLogger => {
  const resolve = (level: LogLevel): LogFn => {
    const candidate = logger[level];
    return typeof candidate === "function" ? candidate.bind(logger) : noopLogger[level];
  };

  const wrap =
    (fn: LogFn): LogFn =>
    (message, meta) => {
      try {
        fn(message, normalizeMeta(meta));
      } catch {
        // ignore logger failures
      }
    };

  return {
    error: wrap(resolve("error")),
    warn: wrap(resolve("warn")),
    info: wrap(resolve("info")),
    debug: wrap(resolve("debug")),
  };
};
