import { createWriteStream } from "node:fs";

import { errorMessage, isErrorInstance, tryGetErrorCause } from "../../web/src/errors/errorProps";
import { LOG_LEVELS, type LogLevel, type LogSink } from "../../web/src/log";

const MAX_CAUSE_DEPTH = 4;

function describeError(err: Error): string {
  let text = errorMessage(err);
  let cause = tryGetErrorCause(err);
  for (let depth = 0; cause !== undefined && depth < MAX_CAUSE_DEPTH; depth += 1) {
    text += `; cause: ${errorMessage(cause)}`;
    cause = tryGetErrorCause(cause);
  }
  return text;
}

function describeDetail(value: unknown): string {
  if (typeof value === "string") return value;
  if (isErrorInstance(value)) return describeError(value);
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/** One JSON object per line. */
export function jsonlSink(write: (line: string) => void, now: () => Date = () => new Date()): LogSink {
  return (level, line, detail) => {
    const entry: Record<string, unknown> = { ts: now().toISOString(), level, msg: line };
    if (detail.length > 0) entry.detail = detail.map(describeDetail);
    write(`${JSON.stringify(entry)}\n`);
  };
}

export interface FileLogSink {
  sink: LogSink;
  close(): Promise<void>;
}

/** Appends JSONL log lines to `file`. */
export function openLogFile(file: string): FileLogSink {
  const stream = createWriteStream(file, { flags: "a" });
  let broken = false;
  stream.on("error", () => {
    broken = true;
  });
  const write = jsonlSink((line) => {
    if (!broken) stream.write(line);
  });
  return {
    sink: write,
    close: () => new Promise<void>((resolve) => stream.end(resolve)),
  };
}

/**
 * Keeps lines at `minLevel` and above until the terminal is restored, so
 * nothing is written over the frame being drawn.
 */
export class DeferredLogSink {
  private readonly held: string[] = [];

  constructor(private readonly minLevel: LogLevel = "error") {}

  readonly sink: LogSink = (level, line, detail) => {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.minLevel)) return;
    const suffix = detail.length > 0 ? ` ${detail.map(describeDetail).join(" ")}` : "";
    this.held.push(`${line}${suffix}`);
  };

  /** Returns the held lines and forgets them. */
  drain(): string[] {
    return this.held.splice(0);
  }
}
