export interface LoggerSink {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const PREFIX = "[chat-tutor]";

const consoleSink: LoggerSink = {
  debug: (message, ...args) => console.debug(message, ...args),
  info: (message, ...args) => console.info(message, ...args),
  warn: (message, ...args) => console.warn(message, ...args),
  error: (message, ...args) => console.error(message, ...args),
};

let sink: LoggerSink = consoleSink;
let debugEnabled = false;

/**
 * Route all log output through `next`. Debug lines are dropped unless
 * `debug` is true. Safe to call more than once (e.g. again after config
 * has been parsed).
 */
export function initLogger(next: LoggerSink | undefined, debug: boolean): void {
  sink = next ?? consoleSink;
  debugEnabled = debug;
}

export const log = {
  debug(message: string, ...args: unknown[]): void {
    if (!debugEnabled) return;
    sink.debug(`${PREFIX} ${message}`, ...args);
  },
  info(message: string, ...args: unknown[]): void {
    sink.info(`${PREFIX} ${message}`, ...args);
  },
  warn(message: string, ...args: unknown[]): void {
    sink.warn(`${PREFIX} ${message}`, ...args);
  },
  error(message: string, ...args: unknown[]): void {
    sink.error(`${PREFIX} ${message}`, ...args);
  },
};
