export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogSink = (level: LogLevel, line: string, detail: readonly unknown[]) => void;

export interface Logger {
  trace(message: string, ...detail: unknown[]): void;
  debug(message: string, ...detail: unknown[]): void;
  info(message: string, ...detail: unknown[]): void;
  warn(message: string, ...detail: unknown[]): void;
  error(message: string, ...detail: unknown[]): void;
}

export const consoleSink: LogSink = (level, line, detail) => {
  switch (level) {
    case "trace":
    case "debug":
      console.debug(line, ...detail);
      return;
    case "info":
      console.info(line, ...detail);
      return;
    case "warn":
      console.warn(line, ...detail);
      return;
    case "error":
      console.error(line, ...detail);
      return;
  }
};

let threshold = LOG_LEVELS.indexOf("info");
let sink: LogSink = consoleSink;

export function setLogLevel(level: LogLevel): void {
  threshold = LOG_LEVELS.indexOf(level);
}

/**
 * Replaces where log lines go. The native build draws into the terminal, so it
 * points this at a file instead of the console. `null` restores the console.
 */
export function setLogSink(next: LogSink | null): void {
  sink = next ?? consoleSink;
}

export function createLogger(scope: string): Logger {
  const at =
    (level: LogLevel) =>
    (message: string, ...detail: unknown[]): void => {
      if (LOG_LEVELS.indexOf(level) < threshold) return;
      sink(level, `[${scope}] ${message}`, detail);
    };
  return {
    trace: at("trace"),
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error"),
  };
}
