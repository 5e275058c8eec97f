import { Writable } from "node:stream";
import type { Logger } from "./logger.ts";
import { createLogger } from "./logger.ts";

export function captureLogLines(): { stream: Writable; lines: string[] } {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      lines.push(...String(chunk).split(/\r?\n/).filter((line) => line.length > 0));
      callback();
    },
  });
  return { stream, lines };
}

/** Winston hands entries to its transports asynchronously. */
export function flushLogs(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 10));
}

export function createSilentLogger(): Logger {
  return createLogger({ silent: true });
}
