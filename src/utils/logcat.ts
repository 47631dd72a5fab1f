import fs from 'fs';
import path from 'path';
import {
  CommandFailedError,
  ExitStatus,
  LaunchError,
  LaunchTimeout,
  LogcatInput,
} from '../types';
import { CommandRunner } from './adb';
import { Canceller } from './canceller';
import { CaptureSession } from './capture';
import { pickDevice } from './devices';
import { describeError } from './error';
import { fileTimestamp, logcatTimestamp } from './format';

const RELATIVE_SINCE = /^(\d+)([smhd])$/;
const ISO_SINCE =
  /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

const UNIT_MS: Record<string, number> = {
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
};

/**
 * Convert a `--since` value ("30s", "5m", "2h", "1d" or an ISO-8601 date or
 * date-time) into the `logcat -T` timestamp. Returns undefined when the value
 * cannot be parsed.
 */
export function parseSince(value: string | undefined, now: Date = new Date()): string | undefined {
  const trimmed = value?.trim();
  if (!trimmed) {
    return undefined;
  }

  const relative = RELATIVE_SINCE.exec(trimmed);
  if (relative) {
    const [, amount, unit] = relative;
    return logcatTimestamp(new Date(now.getTime() - Number(amount) * UNIT_MS[unit]));
  }

  if (!ISO_SINCE.test(trimmed)) {
    return undefined;
  }

  // Date-only strings would otherwise be read as UTC midnight
  const normalized = trimmed.length === 10 ? `${trimmed}T00:00:00` : trimmed.replace(' ', 'T');
  const parsed = new Date(normalized);

  return Number.isNaN(parsed.getTime()) ? undefined : logcatTimestamp(parsed);
}

export function buildLogcatArgs(since: string | undefined, filters: readonly string[]): string[] {
  return ['logcat', ...(since ? ['-T', since] : []), ...filters];
}

export interface LogcatCaptureOptions {
  outputDir: string;
  serial?: string;
  signal?: AbortSignal;
  now?: Date;
  canceller?: Canceller;
  killGraceMs?: number;
}

export interface LogcatCaptureResult {
  deviceId: string;
  path: string;
  /** Absent for dry runs. */
  status?: ExitStatus;
  elapsedMs?: number;
}

function openSink(outPath: string): fs.WriteStream {
  try {
    fs.mkdirSync(path.dirname(outPath), { recursive: true });
    const fd = fs.openSync(outPath, 'w');
    return fs.createWriteStream(outPath, { fd });
  } catch (error) {
    throw new CommandFailedError(`Cannot open ${outPath}: ${describeError(error)}`, {
      path: outPath,
    });
  }
}

function discardOutput(outPath: string, runner: CommandRunner): void {
  try {
    fs.rmSync(outPath, { force: true });
  } catch (error) {
    runner.logger.debug(`Could not remove ${outPath}: ${describeError(error)}`);
  }
}

/**
 * Stream `adb logcat` into a file until the duration elapses or the signal
 * aborts. Either way the capture counts as complete.
 */
export async function captureLogcat(
  runner: CommandRunner,
  input: LogcatInput,
  options: LogcatCaptureOptions
): Promise<LogcatCaptureResult> {
  const deviceId = pickDevice(runner, options.serial);
  const now = options.now ?? new Date();

  if (input.clear) {
    runner.run(['logcat', '-c'], { serial: deviceId });
  }

  const outPath = path.resolve(
    input.out ??
      path.join(options.outputDir, `${deviceId.replace(/[^\w.-]/g, '_')}_${fileTimestamp(now)}.log`)
  );

  const since = parseSince(input.since, now);
  if (input.since && !since) {
    runner.logger.warn(`Ignoring unrecognized --since value '${input.since}'`);
  }

  const args = buildLogcatArgs(since, input.filter);

  if (runner.dryRun) {
    runner.print(`[DRY-RUN] ${runner.describe(args, deviceId)}`);
    runner.print(`[DRY-RUN] Logs would be written to ${outPath}`);
    return { deviceId, path: outPath };
  }

  const sink = openSink(outPath);

  let session: CaptureSession;
  try {
    session = new CaptureSession({
      command: runner.adbPath,
      args: runner.buildArgs(args, deviceId),
      sink,
      durationSeconds: input.duration,
      logger: runner.logger,
      canceller: options.canceller,
      killGraceMs: options.killGraceMs,
    });
  } catch (error) {
    sink.destroy();
    throw error;
  }

  runner.logger.info(
    input.duration > 0
      ? `Capturing logcat for ${input.duration} s...`
      : 'Capturing logcat, press Ctrl+C to stop...'
  );

  try {
    const { status, elapsedMs } = await session.run(options.signal);
    return { deviceId, path: outPath, status, elapsedMs };
  } catch (error) {
    // Nothing was captured
    if (error instanceof LaunchError || error instanceof LaunchTimeout) {
      discardOutput(outPath, runner);
    }
    throw error;
  }
}
