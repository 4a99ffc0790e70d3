/**
 * Tagged logging.
 *
 * Lines are written as `[Tag] message`. Stdout belongs to the terminal UI
 * while the launcher is running, so the CLI points the sink at a log file
 * through `configureLogging`; until then lines go to stderr.
 */

import { Console } from 'console';
import * as fs from 'fs';
import * as path from 'path';

export interface Logger {
  debug: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
}

let sink: Console = new Console({ stdout: process.stderr, stderr: process.stderr });
let sinkStream: fs.WriteStream | null = null;
let debugEnabled = false;

export function configureLogging(options: { filePath?: string; verbose?: boolean }): void {
  debugEnabled = Boolean(options.verbose);
  if (!options.filePath) return;

  fs.mkdirSync(path.dirname(options.filePath), { recursive: true });
  const stream = fs.createWriteStream(options.filePath, { flags: 'a' });
  if (sinkStream) sinkStream.end();
  sinkStream = stream;
  sink = new Console({ stdout: stream, stderr: stream });
}

export function closeLogging(): void {
  if (!sinkStream) return;
  sinkStream.end();
  sinkStream = null;
  sink = new Console({ stdout: process.stderr, stderr: process.stderr });
}

function timestamp(): string {
  return new Date().toISOString();
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (message, ...details) => {
      if (!debugEnabled) return;
      sink.log(timestamp(), prefix, message, ...details);
    },
    info: (message, ...details) => {
      sink.log(timestamp(), prefix, message, ...details);
    },
    warn: (message, ...details) => {
      sink.warn(timestamp(), prefix, message, ...details);
    },
    error: (message, ...details) => {
      sink.error(timestamp(), prefix, message, ...details);
    },
  };
}
