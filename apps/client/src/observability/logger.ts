/**
 * Diagnostic logging on stderr
 *
 * stdout carries forwarded messages, so nothing here ever writes to it.
 */

import { MessageKind } from "../../../../packages/protocol/src/constants.js";
import type { Message } from "../../../../packages/protocol/src/types.js";
import type { DiagnosticLogger } from "../../../../packages/transport/src/types.js";

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  stream?: LogSink;
  clock?: () => Date;
}

/**
 * Pick the log level from repeatable -v / -q counts
 */
export function resolveLogLevel(
  verbose: number,
  quiet: number,
  debug: boolean = false
): LogLevel {
  if (verbose > 0 || debug) return LogLevel.DEBUG;
  if (quiet >= 2) return LogLevel.ERROR;
  if (quiet === 1) return LogLevel.WARN;
  return LogLevel.INFO;
}

export class Logger implements DiagnosticLogger {
  private level: LogLevel;
  private stream: LogSink;
  private clock: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.stream = options.stream ?? process.stderr;
    this.clock = options.clock ?? (() => new Date());
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Format log message
   */
  private format(level: LogLevel, message: string, meta?: unknown): string {
    const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
    return `[${this.clock().toISOString()}] [${level}] ${message}${metaStr}`;
  }

  private log(level: LogLevel, message: string, meta?: unknown): void {
    if (SEVERITY[level] < SEVERITY[this.level]) return;
    this.stream.write(`${this.format(level, message, meta)}\n`);
  }

  debug(message: string, meta?: unknown): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.log(LogLevel.ERROR, message, meta);
  }

  /**
   * Log message details (debug only)
   */
  frame(direction: "→" | "←", message: Message): void {
    if (this.level !== LogLevel.DEBUG) return;

    this.debug(`${direction} Message`, {
      kind: MessageKind[message.kind] ?? `UNKNOWN(${message.kind})`,
      bodySize: `${Buffer.byteLength(message.body, "utf8")}B`,
    });
  }
}
