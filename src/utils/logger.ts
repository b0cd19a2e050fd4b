/***
 * Logger — Leveled, context-tagged console output.
 *
 * Messages below the configured level are dropped before formatting.
 * The sink defaults to the global console and can be swapped (tests
 * capture output this way, hosts can route it into their own log).
 *
 *   Logger.warn("bindings", "Registry not bound, call ignored");
 *   // [12:34:56.789] [WARN] [bindings] Registry not bound, call ignored
 *
 ***/

export enum LOG_LEVEL {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface LogSink {
  debug(line: string): void;
  info(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

export interface LoggerOptions {
  level?: LOG_LEVEL;
  sink?: LogSink;
}

const LEVEL_LABELS: Record<Exclude<LOG_LEVEL, LOG_LEVEL.SILENT>, string> = {
  [LOG_LEVEL.DEBUG]: "DEBUG",
  [LOG_LEVEL.INFO]: "INFO",
  [LOG_LEVEL.WARN]: "WARN",
  [LOG_LEVEL.ERROR]: "ERROR",
};

export namespace Logger {
  let current_level: LOG_LEVEL = LOG_LEVEL.WARN;
  let current_sink: LogSink = console;

  export function configure(options: LoggerOptions): void {
    if (options.level !== undefined) current_level = options.level;
    if (options.sink !== undefined) current_sink = options.sink;
  }

  export function reset(): void {
    current_level = LOG_LEVEL.WARN;
    current_sink = console;
  }

  export function level(): LOG_LEVEL {
    return current_level;
  }

  export function format(
    level: Exclude<LOG_LEVEL, LOG_LEVEL.SILENT>,
    context: string,
    message: string,
  ): string {
    const timestamp = new Date().toISOString().slice(11, 23);
    return `[${timestamp}] [${LEVEL_LABELS[level]}] [${context}] ${message}`;
  }

  export function debug(context: string, message: string): void {
    if (current_level > LOG_LEVEL.DEBUG) return;
    current_sink.debug(format(LOG_LEVEL.DEBUG, context, message));
  }

  export function info(context: string, message: string): void {
    if (current_level > LOG_LEVEL.INFO) return;
    current_sink.info(format(LOG_LEVEL.INFO, context, message));
  }

  export function warn(context: string, message: string): void {
    if (current_level > LOG_LEVEL.WARN) return;
    current_sink.warn(format(LOG_LEVEL.WARN, context, message));
  }

  export function error(context: string, message: string): void {
    if (current_level > LOG_LEVEL.ERROR) return;
    current_sink.error(format(LOG_LEVEL.ERROR, context, message));
  }
}
