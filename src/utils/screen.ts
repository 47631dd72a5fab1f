import fs from 'fs';
import path from 'path';
import { CommandFailedError, DeviceCommandResult, RecordInput, ScreenRotateInput } from '../types';
import { CommandRunner } from './adb';
import { pickDevice } from './devices';
import { describeError } from './error';
import { fileTimestamp } from './format';

export const DEFAULT_RECORD_SECONDS = 30;
export const MAX_RECORD_SECONDS = 180;
export const DEFAULT_RECORD_BITRATE_MBPS = 4;
// Extra time screenrecord gets on top of its own time limit
const RECORD_TIMEOUT_SLACK_SECONDS = 5;

export interface RecordingResult {
  deviceId: string;
  path: string;
  durationSeconds: number;
  bitRate: number;
}

function settingsPut(
  runner: CommandRunner,
  deviceId: string,
  key: string,
  value: string
): DeviceCommandResult {
  return {
    deviceId,
    ...runner.run(['shell', 'settings', 'put', 'system', key, value], { serial: deviceId }),
  };
}

// Read or override the display size (`wm size`)
export function screenSize(
  runner: CommandRunner,
  size?: string,
  serial?: string
): DeviceCommandResult {
  const deviceId = pickDevice(runner, serial);
  const args = ['shell', 'wm', 'size', ...(size ? [size] : [])];
  return { deviceId, ...runner.run(args, { serial: deviceId }) };
}

// Read or override the display density (`wm density`)
export function screenDensity(
  runner: CommandRunner,
  density?: number,
  serial?: string
): DeviceCommandResult {
  const deviceId = pickDevice(runner, serial);
  const args = ['shell', 'wm', 'density', ...(density ? [String(density)] : [])];
  return { deviceId, ...runner.run(args, { serial: deviceId }) };
}

/**
 * Lock the orientation (auto-rotation off, then `user_rotation`) or give
 * control back to the accelerometer.
 */
export function rotateScreen(
  runner: CommandRunner,
  input: ScreenRotateInput,
  serial?: string
): DeviceCommandResult {
  const deviceId = pickDevice(runner, serial);

  if (input.unlock) {
    return settingsPut(runner, deviceId, 'accelerometer_rotation', '1');
  }

  settingsPut(runner, deviceId, 'accelerometer_rotation', '0');
  return settingsPut(runner, deviceId, 'user_rotation', input.landscape ? '1' : '0');
}

export function clampRecordDuration(seconds?: number): number {
  return Math.min(Math.max(seconds || DEFAULT_RECORD_SECONDS, 1), MAX_RECORD_SECONDS);
}

/**
 * Record the screen on the device, pull the video and remove the temporary
 * file from the device whether or not the pull succeeded.
 */
export function recordScreen(
  runner: CommandRunner,
  input: RecordInput,
  options: { outputDir: string; serial?: string; now?: Date }
): RecordingResult {
  const deviceId = pickDevice(runner, options.serial);
  const now = options.now ?? new Date();
  const durationSeconds = clampRecordDuration(input.duration);
  const bitRate = Math.trunc((input.bitrate ?? DEFAULT_RECORD_BITRATE_MBPS) * 1_000_000);
  const remotePath = `/sdcard/droidctl_record_${Math.floor(now.getTime() / 1000)}.mp4`;
  const outPath = path.resolve(
    input.out ??
      path.join(
        options.outputDir,
        `${deviceId.replace(/[^\w.-]/g, '_')}_${fileTimestamp(now)}.mp4`
      )
  );

  if (!runner.dryRun) {
    fs.mkdirSync(path.dirname(outPath), { recursive: true });
  }

  runner.logger.info(`Recording screen for ${durationSeconds} s...`);

  const recorded = runner.run(
    ['shell', 'screenrecord', `--time-limit=${durationSeconds}`, `--bit-rate=${bitRate}`, remotePath],
    { serial: deviceId, timeoutMs: (durationSeconds + RECORD_TIMEOUT_SLACK_SECONDS) * 1000 }
  );

  try {
    if (recorded.exitCode !== 0) {
      throw new CommandFailedError(
        `screenrecord exited with code ${recorded.exitCode}: ` +
          (recorded.stderr.trim() || recorded.stdout.trim()),
        { deviceId, exitCode: recorded.exitCode }
      );
    }

    const pulled = runner.run(['pull', remotePath, outPath], { serial: deviceId });
    if (pulled.exitCode !== 0) {
      throw new CommandFailedError(
        `Failed to pull the recording: ${pulled.stderr.trim() || pulled.stdout.trim()}`,
        { deviceId, remotePath, exitCode: pulled.exitCode }
      );
    }
  } finally {
    removeRemoteFile(runner, deviceId, remotePath);
  }

  return { deviceId, path: outPath, durationSeconds, bitRate };
}

function removeRemoteFile(runner: CommandRunner, deviceId: string, remotePath: string): void {
  try {
    const { exitCode, stderr } = runner.run(['shell', 'rm', '-f', remotePath], {
      serial: deviceId,
    });
    if (exitCode !== 0) {
      runner.logger.warn(`Failed to remove ${remotePath} from the device: ${stderr.trim()}`);
    }
  } catch (error) {
    runner.logger.warn(`Failed to remove ${remotePath} from the device: ${describeError(error)}`);
  }
}
