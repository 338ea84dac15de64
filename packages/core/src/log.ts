/**
 * Console logger handed to every component through its options.
 *
 * Output is one line per entry: `[scope] message key=value ...`.
 * Debug entries are dropped unless the logger was created verbose.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  /** A logger that tags its lines with `parent:scope`. */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  /** Tag printed in brackets at the start of every line. */
  scope?: string;
  /** Emit debug entries. Default: false. */
  verbose?: boolean;
  /**
   * Line sink. Defaults to console.log for debug/info and console.error
   * for warn/error.
   */
  write?: (level: LogLevel, line: string) => void;
}

function consoleWrite(level: LogLevel, line: string): void {
  if (level === "warn" || level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

function formatValue(value: unknown): string {
  if (value instanceof Error) return JSON.stringify(value.message);
  if (typeof value === "string") {
    return /^[^\s"=]+$/.test(value) ? value : JSON.stringify(value);
  }
  if (value === undefined) return "undefined";
  return JSON.stringify(value) ?? String(value);
}

/** Render a log line. Exported for tests and custom sinks. */
export function formatLine(
  scope: string | undefined,
  message: string,
  fields?: LogFields,
): string {
  let line = scope ? `[${scope}] ${message}` : message;
  if (fields) {
    for (const [key, value] of Object.entries(fields)) {
      line += ` ${key}=${formatValue(value)}`;
    }
  }
  return line;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;
  const write = options.write ?? consoleWrite;
  const scope = options.scope;

  const emit = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (level === "debug" && !verbose) return;
    write(level, formatLine(scope, message, fields));
  };

  return {
    debug: (message, fields) => emit("debug", message, fields),
    info: (message, fields) => emit("info", message, fields),
    warn: (message, fields) => emit("warn", message, fields),
    error: (message, fields) => emit("error", message, fields),
    child(childScope: string): Logger {
      return createLogger({
        verbose,
        write,
        scope: scope ? `${scope}:${childScope}` : childScope,
      });
    },
  };
}

const noop = (): void => {};

/** Discards everything. */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  child: () => silentLogger,
};
