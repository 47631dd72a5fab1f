import fs from 'fs';
import os from 'os';
import path from 'path';
import { CommandFailedError } from '../../src/types';
import {
  clampRecordDuration,
  recordScreen,
  rotateScreen,
  screenDensity,
  screenSize,
} from '../../src/utils/screen';
import {
  createCapturingLogger,
  createMockRunner,
  mockSingleDeviceListOutput,
} from '../mocks/adb.mock';

const NOW = new Date(2025, 8, 4, 12, 0, 0);
const REMOTE = `/sdcard/droidctl_record_${Math.floor(NOW.getTime() / 1000)}.mp4`;

describe('Screen Utilities', () => {
  describe('screenSize and screenDensity', () => {
    it('should read the current values', () => {
      const runner = createMockRunner({
        'devices -l': mockSingleDeviceListOutput,
        'shell wm size': 'Physical size: 1080x2400\n',
        'shell wm density': 'Physical density: 420\n',
      });

      expect(screenSize(runner).stdout).toBe('Physical size: 1080x2400\n');
      expect(screenDensity(runner).stdout).toBe('Physical density: 420\n');
    });

    it('should pass overrides through', () => {
      const runner = createMockRunner({}, { dryRun: true });

      screenSize(runner, '720x1280', 'emulator-5554');
      screenDensity(runner, 320, 'emulator-5554');

      expect(runner.printed).toEqual([
        '[DRY-RUN] /usr/bin/adb -s emulator-5554 shell wm size 720x1280',
        '[DRY-RUN] /usr/bin/adb -s emulator-5554 shell wm density 320',
      ]);
    });
  });

  describe('rotateScreen', () => {
    it('should lock auto-rotation before setting the orientation', () => {
      const runner = createMockRunner({}, { dryRun: true });

      rotateScreen(runner, { landscape: true, portrait: false, unlock: false }, 'emulator-5554');
      rotateScreen(runner, { landscape: false, portrait: true, unlock: false }, 'emulator-5554');

      expect(runner.calls.map(call => call.args.join(' '))).toEqual([
        'shell settings put system accelerometer_rotation 0',
        'shell settings put system user_rotation 1',
        'shell settings put system accelerometer_rotation 0',
        'shell settings put system user_rotation 0',
      ]);
    });

    it('should hand rotation back to the sensor on unlock', () => {
      const runner = createMockRunner({}, { dryRun: true });

      rotateScreen(runner, { landscape: false, portrait: false, unlock: true }, 'emulator-5554');

      expect(runner.calls.map(call => call.args.join(' '))).toEqual([
        'shell settings put system accelerometer_rotation 1',
      ]);
    });
  });

  describe('clampRecordDuration', () => {
    it('should default to 30 seconds and stay within 1-180', () => {
      expect(clampRecordDuration()).toBe(30);
      expect(clampRecordDuration(0)).toBe(30);
      expect(clampRecordDuration(-5)).toBe(1);
      expect(clampRecordDuration(45)).toBe(45);
      expect(clampRecordDuration(600)).toBe(180);
    });
  });

  describe('recordScreen', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'droidctl-record-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should record, pull and clean up the device copy', () => {
      const out = path.join(tmpDir, 'videos', 'demo.mp4');
      const runner = createMockRunner({
        'devices -l': mockSingleDeviceListOutput,
        [`shell screenrecord --time-limit=10 --bit-rate=2500000 ${REMOTE}`]: '',
        [`pull ${REMOTE} ${out}`]: `${REMOTE}: 1 file pulled\n`,
        [`shell rm -f ${REMOTE}`]: '',
      });

      const result = recordScreen(runner, { duration: 10, bitrate: 2.5, out }, {
        outputDir: tmpDir,
        now: NOW,
      });

      expect(result).toEqual({
        deviceId: 'emulator-5554',
        path: out,
        durationSeconds: 10,
        bitRate: 2500000,
      });
      expect(fs.existsSync(path.dirname(out))).toBe(true);
      expect(runner.calls.slice(-3)).toEqual([
        {
          args: ['shell', 'screenrecord', '--time-limit=10', '--bit-rate=2500000', REMOTE],
          serial: 'emulator-5554',
          timeoutMs: 15000,
        },
        { args: ['pull', REMOTE, out], serial: 'emulator-5554', timeoutMs: undefined },
        { args: ['shell', 'rm', '-f', REMOTE], serial: 'emulator-5554', timeoutMs: undefined },
      ]);
    });

    it('should name the video after the device by default', () => {
      const runner = createMockRunner({}, { dryRun: true });

      const result = recordScreen(runner, {}, { outputDir: tmpDir, serial: 'emulator-5554', now: NOW });

      expect(result.path).toBe(path.join(tmpDir, 'emulator-5554_20250904-120000.mp4'));
      expect(result.durationSeconds).toBe(30);
      expect(result.bitRate).toBe(4000000);
      expect(fs.readdirSync(tmpDir)).toEqual([]);
    });

    it('should remove the device copy even when the pull fails', () => {
      const { logger, messages } = createCapturingLogger();
      const out = path.join(tmpDir, 'demo.mp4');
      const runner = createMockRunner(
        {
          'devices -l': mockSingleDeviceListOutput,
          [`shell screenrecord --time-limit=30 --bit-rate=4000000 ${REMOTE}`]: '',
          [`pull ${REMOTE} ${out}`]: { exitCode: 1, stderr: 'adb: error: failed to stat remote object\n' },
          [`shell rm -f ${REMOTE}`]: { exitCode: 1, stderr: 'rm: Read-only file system\n' },
        },
        { logger }
      );

      expect(() => recordScreen(runner, { out }, { outputDir: tmpDir, now: NOW })).toThrow(
        new CommandFailedError(
          'Failed to pull the recording: adb: error: failed to stat remote object'
        )
      );
      expect(runner.calls[runner.calls.length - 1].args).toEqual(['shell', 'rm', '-f', REMOTE]);
      expect(messages(40)).toEqual([
        `Failed to remove ${REMOTE} from the device: rm: Read-only file system`,
      ]);
    });

    it('should not pull when screenrecord fails', () => {
      const out = path.join(tmpDir, 'demo.mp4');
      const runner = createMockRunner({
        'devices -l': mockSingleDeviceListOutput,
        [`shell screenrecord --time-limit=5 --bit-rate=4000000 ${REMOTE}`]: {
          exitCode: 137,
          stderr: 'Unable to get output buffers\n',
        },
        [`shell rm -f ${REMOTE}`]: '',
      });

      expect(() =>
        recordScreen(runner, { out, duration: 5 }, { outputDir: tmpDir, now: NOW })
      ).toThrow('screenrecord exited with code 137: Unable to get output buffers');
      expect(runner.calls.slice(-2).map(call => call.args[1])).toEqual(['screenrecord', 'rm']);
    });
  });
});
