import { Writable } from "stream";
import { Logger, LogLevel } from "../src/observability/logger.js";

/**
 * A Writable that keeps every chunk as text
 */
export function createCapture(onWrite?: (count: number) => void) {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString("utf8"));
      callback();
      onWrite?.(chunks.length);
    },
  });

  return { stream, chunks, text: () => chunks.join("") };
}

export function createQuietLogger(): Logger {
  return new Logger({ level: LogLevel.ERROR, stream: { write: () => true } });
}
