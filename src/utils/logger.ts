import fs from 'fs';
import path from 'path';
import pino from 'pino';
import type { Level, Logger, StreamEntry } from 'pino';
import { createConsoleStream } from './console-stream';
import { describeError } from './error';

export const LOG_MAX_BYTES = 1_000_000;
export const LOG_BACKUP_COUNT = 5;

export interface LoggingOptions {
  verbose?: boolean;
  quiet?: boolean;
  /** Diagnostic log file; omitted or empty disables it. */
  logFile?: string;
  stderr?: NodeJS.WritableStream;
  color?: boolean;
}

/**
 * Logger plus the resources behind it. Created once per run and closed when
 * the run ends.
 */
export interface LoggingContext {
  readonly logger: Logger;
  readonly level: Level;
  close(): void;
}

export function resolveLogLevel(options: { verbose?: boolean; quiet?: boolean }): Level {
  if (options.quiet) {
    return 'warn';
  }
  return options.verbose ? 'debug' : 'info';
}

/**
 * Shift `file` to `file.1` (and older backups up by one) once it has grown
 * past `maxBytes`; the oldest backup is dropped.
 */
export function rotateLogFile(
  file: string,
  maxBytes: number = LOG_MAX_BYTES,
  backupCount: number = LOG_BACKUP_COUNT
): boolean {
  if (!fs.existsSync(file) || fs.statSync(file).size < maxBytes) {
    return false;
  }

  fs.rmSync(`${file}.${backupCount}`, { force: true });
  for (let index = backupCount - 1; index >= 1; index--) {
    const from = `${file}.${index}`;
    if (fs.existsSync(from)) {
      fs.renameSync(from, `${file}.${index + 1}`);
    }
  }
  fs.renameSync(file, `${file}.1`);

  return true;
}

export function createLoggingContext(options: LoggingOptions = {}): LoggingContext {
  const level = resolveLogLevel(options);
  const stderr = options.stderr ?? process.stderr;
  const streams: StreamEntry[] = [
    { level, stream: createConsoleStream(stderr, { color: options.color }) },
  ];
  const problems: string[] = [];

  let destination: ReturnType<typeof pino.destination> | undefined;
  if (options.logFile) {
    const file = path.resolve(options.logFile);
    try {
      rotateLogFile(file);
      destination = pino.destination({ dest: file, sync: true, mkdir: true });
      streams.push({ level, stream: destination });
    } catch (error) {
      problems.push(`Log file ${file} is not writable: ${describeError(error)}`);
    }
  }

  const logger = pino(
    {
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
      base: {},
    },
    pino.multistream(streams)
  );

  for (const problem of problems) {
    logger.warn(problem);
  }

  let closed = false;

  return {
    logger,
    level,
    close() {
      if (closed) return;
      closed = true;
      destination?.end();
    },
  };
}
