import { nanoid } from "nanoid";

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFields = Record<string, unknown>;
export type LogFn = (level: LogLevel, event: string, fields?: LogFields) => void;

export type Logger = {
  debug: (event: string, fields?: LogFields) => void;
  info: (event: string, fields?: LogFields) => void;
  warn: (event: string, fields?: LogFields) => void;
  error: (event: string, fields?: LogFields) => void;
  child: (fields: LogFields) => Logger;
};

export const makeRequestId = () => nanoid();

export const safeError = (error: unknown) => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }

  return {
    name: "Error",
    message: typeof error === "string" ? error : JSON.stringify(error)
  };
};

export const log: LogFn = (level, event, fields = {}) => {
  console.log(
    JSON.stringify({
      ts: new Date().toISOString(),
      level,
      event,
      ...fields
    })
  );
};

export const logServerError = (event: string, error: unknown, fields: LogFields = {}) =>
  log("error", event, { ...fields, error: safeError(error) });

export const createLogger = (baseFields: LogFields = {}): Logger => {
  const withFields = (fields?: LogFields) => ({ ...baseFields, ...(fields ?? {}) });
  return {
    debug: (event, fields) => log("debug", event, withFields(fields)),
    info: (event, fields) => log("info", event, withFields(fields)),
    warn: (event, fields) => log("warn", event, withFields(fields)),
    error: (event, fields) => log("error", event, withFields(fields)),
    child: (fields) => createLogger(withFields(fields))
  };
};

const noop = () => undefined;

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  child: () => silentLogger
};
