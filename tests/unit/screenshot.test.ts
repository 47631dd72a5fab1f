import fs from 'fs';
import os from 'os';
import path from 'path';
import { CommandFailedError, ScreenshotCaptureError } from '../../src/types';
import {
  captureScreenshot,
  defaultScreenshotPath,
  getPNGDimensions,
  isPNG,
} from '../../src/utils/screenshot';
import { createMockRunner, mockScreenshotData } from '../mocks/adb.mock';

const SCREENCAP = 'exec-out screencap -p';

describe('Screenshot Utilities', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'droidctl-screenshot-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('getPNGDimensions', () => {
    it('should correctly extract dimensions from PNG data', () => {
      const dimensions = getPNGDimensions(mockScreenshotData);

      expect(dimensions.width).toBe(100);
      expect(dimensions.height).toBe(200);
    });

    it('should throw error for invalid PNG data', () => {
      const invalidData = Buffer.from([0x00, 0x01, 0x02, 0x03]);

      expect(isPNG(invalidData)).toBe(false);
      expect(() => getPNGDimensions(invalidData)).toThrow('Invalid PNG data');
    });

    it('should throw error for PNG data that is too short', () => {
      const shortData = Buffer.from([0x89, 0x50, 0x4e, 0x47]);

      expect(() => getPNGDimensions(shortData)).toThrow('Invalid PNG data');
    });
  });

  describe('defaultScreenshotPath', () => {
    it('should name the file after the device and the local time', () => {
      const now = new Date(2025, 8, 4, 12, 30, 5);

      expect(defaultScreenshotPath('screenshots', '192.168.1.100:5555', now)).toBe(
        path.join('screenshots', '192.168.1.100_5555_20250904-123005.png')
      );
    });
  });

  describe('captureScreenshot', () => {
    it('should write the PNG and report its dimensions', () => {
      const runner = createMockRunner({ [SCREENCAP]: mockScreenshotData });
      const out = path.join(tmpDir, 'nested', 'shot.png');

      const result = captureScreenshot(runner, 'emulator-5554', out);

      expect(result).toEqual({
        deviceId: 'emulator-5554',
        path: out,
        width: 100,
        height: 200,
        bytes: mockScreenshotData.length,
      });
      expect(fs.readFileSync(out).equals(mockScreenshotData)).toBe(true);
      expect(runner.calls).toEqual([
        { args: ['exec-out', 'screencap', '-p'], serial: 'emulator-5554', timeoutMs: undefined },
      ]);
    });

    it('should fail when screencap exits with an error', () => {
      const runner = createMockRunner({
        [SCREENCAP]: { exitCode: 1, stderr: 'error: device offline\n' },
      });

      expect(() => captureScreenshot(runner, 'emulator-5554', path.join(tmpDir, 'a.png'))).toThrow(
        new CommandFailedError('screencap exited with code 1: error: device offline')
      );
    });

    it('should fail when the device returns no data', () => {
      const runner = createMockRunner({ [SCREENCAP]: Buffer.alloc(0) });

      expect(() => captureScreenshot(runner, 'emulator-5554', path.join(tmpDir, 'a.png'))).toThrow(
        "Failed to capture screenshot from device 'emulator-5554': device returned no image data"
      );
    });

    it('should fail when the device returns something other than a PNG', () => {
      const runner = createMockRunner({ [SCREENCAP]: 'screencap: permission denied\n' });
      const out = path.join(tmpDir, 'a.png');

      expect(() => captureScreenshot(runner, 'emulator-5554', out)).toThrow(ScreenshotCaptureError);
      expect(fs.existsSync(out)).toBe(false);
    });

    it('should only describe the capture in dry-run mode', () => {
      const runner = createMockRunner({}, { dryRun: true });
      const out = path.join(tmpDir, 'dry.png');

      expect(captureScreenshot(runner, '<device>', out)).toBeUndefined();
      expect(runner.printed).toEqual([
        '[DRY-RUN] /usr/bin/adb -s <device> exec-out screencap -p',
        `[DRY-RUN] Screenshot would be saved to ${out}`,
      ]);
      expect(fs.existsSync(out)).toBe(false);
    });
  });
});
