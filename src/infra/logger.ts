import fs from 'node:fs';
import path from 'node:path';
import { pino, levels, type Logger, type LevelWithSilent } from 'pino';
import { build, prettyFactory } from 'pino-pretty';

type PrettyOptions = NonNullable<Parameters<typeof prettyFactory>[0]>;

export const LOG_FILE_NAME = 'server.log';

export class LogSinkError extends Error {
  constructor(readonly file: string, cause: unknown) {
    super(`cannot open log file ${file}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = 'LogSinkError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** `info` → `| INFO  |` */
export function formatLevel(label: string): string {
  return `| ${label.padEnd(6)}|`.toUpperCase();
}

/**
 * Console-style single-line output: RFC822 timestamp (UTC), uppercase level
 * tag, message, then any extra fields inline.
 */
export function prettyOptions(): PrettyOptions {
  return {
    colorize: false,
    singleLine: true,
    translateTime: 'dd mmm yy HH:MM Z',
    ignore: 'pid,hostname',
    customPrettifiers: {
      // pino-pretty hands over the numeric level
      level: (value: string | object): string =>
        formatLevel(levels.labels[Number(value)] ?? String(value)),
    },
  };
}

/**
 * Where log lines go for a given log directory.
 * Returns null for standard output.
 */
export function resolveLogFile(logDir: string): string | null {
  const dir = logDir.trim();
  if (dir === '' || dir === 'stdout') {
    return null;
  }
  return path.join(dir, LOG_FILE_NAME);
}

function openSink(logDir: string): number {
  const file = resolveLogFile(logDir);
  if (file === null) {
    return process.stdout.fd;
  }
  try {
    return fs.openSync(file, 'a', 0o664);
  } catch (err) {
    throw new LogSinkError(file, err);
  }
}

export function createLogger(options: { logDir: string; level: LevelWithSilent }): Logger {
  const destination = openSink(options.logDir);
  return pino(
    { level: options.level },
    build({ ...prettyOptions(), destination, sync: true })
  );
}
