import fs from 'fs';
import path from 'path';
import { CommandFailedError, ScreenshotCaptureError } from '../types';
import { CommandRunner } from './adb';
import { fileTimestamp } from './format';

const PNG_SIGNATURE = '89504e470d0a1a0a';

export interface ScreenshotResult {
  deviceId: string;
  path: string;
  width: number;
  height: number;
  bytes: number;
}

export function isPNG(data: Buffer): boolean {
  return data.length >= 24 && data.toString('hex', 0, 8) === PNG_SIGNATURE;
}

// Get image dimensions from PNG data
export function getPNGDimensions(pngData: Buffer): { width: number; height: number } {
  if (!isPNG(pngData)) {
    throw new Error('Invalid PNG data');
  }

  // The first chunk is IHDR which starts at byte 8
  // The width is at bytes 16-19 (big-endian)
  // The height is at bytes 20-23 (big-endian)
  const width = pngData.readUInt32BE(16);
  const height = pngData.readUInt32BE(20);

  return { width, height };
}

export function defaultScreenshotPath(
  outputDir: string,
  deviceId: string,
  now: Date = new Date()
): string {
  return path.join(outputDir, `${deviceId.replace(/[^\w.-]/g, '_')}_${fileTimestamp(now)}.png`);
}

/**
 * Capture the device screen with `exec-out screencap -p` and store it as a
 * PNG file at `outPath`.
 */
export function captureScreenshot(
  runner: CommandRunner,
  deviceId: string,
  outPath: string
): ScreenshotResult | undefined {
  const target = path.resolve(outPath);

  if (runner.dryRun) {
    runner.runBinary(['exec-out', 'screencap', '-p'], { serial: deviceId });
    runner.print(`[DRY-RUN] Screenshot would be saved to ${target}`);
    return undefined;
  }

  const { exitCode, stdout, stderr } = runner.runBinary(['exec-out', 'screencap', '-p'], {
    serial: deviceId,
  });

  if (exitCode !== 0) {
    throw new CommandFailedError(`screencap exited with code ${exitCode}: ${stderr.trim()}`, {
      deviceId,
      exitCode,
    });
  }

  if (stdout.length === 0) {
    throw new ScreenshotCaptureError(deviceId, 'device returned no image data');
  }

  if (!isPNG(stdout)) {
    throw new ScreenshotCaptureError(deviceId, 'device returned data that is not a PNG image');
  }

  const { width, height } = getPNGDimensions(stdout);

  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, stdout);
  runner.logger.debug({ deviceId, path: target, width, height }, 'Screenshot saved');

  return { deviceId, path: target, width, height, bytes: stdout.length };
}
