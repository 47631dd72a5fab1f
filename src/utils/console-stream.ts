import { Writable } from 'stream';
import pc from 'picocolors';

/** Pino numeric levels */
const WARN = 40;
const ERROR = 50;

interface PinoLogEntry {
  level: number;
  msg?: string;
  [key: string]: unknown;
}

export interface ConsoleStreamOptions {
  color?: boolean;
}

function isLogEntry(value: unknown): value is PinoLogEntry {
  return typeof value === 'object' && value !== null && 'level' in value && typeof value.level === 'number';
}

/**
 * Format one pino entry for the terminal: the message only, prefixed for
 * warnings and errors.
 */
export function formatConsoleLine(entry: PinoLogEntry, color = false): string {
  const colors = pc.createColors(color);
  const msg = entry.msg ?? '';

  if (entry.level >= ERROR) {
    return colors.red(`Error: ${msg}`);
  }
  if (entry.level >= WARN) {
    return colors.yellow(`Warning: ${msg}`);
  }
  if (entry.level < 30) {
    return colors.dim(msg);
  }
  return msg;
}

/**
 * Writable destination for pino that renders JSON lines as plain console
 * messages on `target`.
 */
export function createConsoleStream(
  target: NodeJS.WritableStream,
  options: ConsoleStreamOptions = {}
): Writable {
  return new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      for (const line of chunk.toString().split('\n').filter(Boolean)) {
        let entry: unknown;
        try {
          entry = JSON.parse(line);
        } catch {
          // Not JSON, pass through as-is
          target.write(`${line}\n`);
          continue;
        }

        target.write(
          isLogEntry(entry) ? `${formatConsoleLine(entry, options.color)}\n` : `${line}\n`
        );
      }

      callback();
    },
  });
}
