import pino from 'pino';
import type { Logger } from 'pino';
import { BinaryCommandResult, CommandResult } from '../../src/types';
import { CommandRunner, RunOptions } from '../../src/utils/adb';

// Mock device list output
export const mockDeviceListOutput = `List of devices attached
emulator-5554	device product:sdk_gphone_x86 model:sdk_gphone_x86 transport_id:1
192.168.1.100:5555	device product:pixel model:pixel transport_id:2`;

export const mockSingleDeviceListOutput = `List of devices attached
emulator-5554	device product:sdk_gphone_x86 model:sdk_gphone_x86 transport_id:1`;

// Mock empty device list output
export const mockEmptyDeviceListOutput = 'List of devices attached';

// Mock unauthorized device list output
export const mockUnauthorizedDeviceListOutput = `List of devices attached
192.168.1.100:5555	unauthorized product:pixel model:pixel transport_id:2`;

// Mock PNG screenshot data (minimal PNG with 100x200 dimensions)
export const mockScreenshotData = Buffer.from([
  0x89, 0x50, 0x4E, 0x47, 0x0D, 0x0A, 0x1A, 0x0A, // PNG signature
  0x00, 0x00, 0x00, 0x0D, // IHDR chunk size
  0x49, 0x48, 0x44, 0x52, // IHDR chunk type
  0x00, 0x00, 0x00, 0x64, // Width: 100
  0x00, 0x00, 0x00, 0xC8, // Height: 200
  0x08, 0x02, 0x00, 0x00, 0x00, // Bit depth, color type, compression, filter, interlace
]);

export type MockResponse =
  | string
  | Buffer
  | Error
  | { exitCode?: number; stdout?: string | Buffer; stderr?: string };

export interface RecordedCall {
  args: string[];
  serial?: string;
  timeoutMs?: number;
}

export interface MockRunner extends CommandRunner {
  readonly calls: RecordedCall[];
  readonly printed: string[];
}

export interface MockRunnerOptions {
  dryRun?: boolean;
  adbPath?: string;
  /** Placed before the adb arguments, e.g. a script run by `adbPath`. */
  launchArgs?: string[];
  timeoutMs?: number;
  logger?: Logger;
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * Scripted CommandRunner. Responses are keyed by the adb arguments joined
 * with spaces, without the `-s <serial>` prefix; unknown commands exit 1.
 */
export function createMockRunner(
  responses: Record<string, MockResponse> = {},
  options: MockRunnerOptions = {}
): MockRunner {
  const calls: RecordedCall[] = [];
  const printed: string[] = [];
  const adbPath = options.adbPath ?? '/usr/bin/adb';
  const dryRun = options.dryRun ?? false;

  const launchArgs = options.launchArgs ?? [];

  const buildArgs = (args: readonly string[], serial?: string): string[] => [
    ...launchArgs,
    ...(serial ? ['-s', serial] : []),
    ...args,
  ];

  const describe = (args: readonly string[], serial?: string): string =>
    [adbPath, ...buildArgs(args, serial)].join(' ');

  const respond = (args: readonly string[], runOptions: RunOptions): BinaryCommandResult => {
    calls.push({ args: [...args], serial: runOptions.serial, timeoutMs: runOptions.timeoutMs });

    if (dryRun) {
      printed.push(`[DRY-RUN] ${describe(args, runOptions.serial)}`);
      return { exitCode: 0, stdout: Buffer.alloc(0), stderr: '' };
    }

    const key = args.join(' ');
    const response = responses[key];

    if (response === undefined) {
      return { exitCode: 1, stdout: Buffer.alloc(0), stderr: `unknown command: ${key}` };
    }
    if (response instanceof Error) {
      throw response;
    }
    if (typeof response === 'string' || Buffer.isBuffer(response)) {
      return { exitCode: 0, stdout: Buffer.from(response), stderr: '' };
    }

    return {
      exitCode: response.exitCode ?? 0,
      stdout: Buffer.from(response.stdout ?? ''),
      stderr: response.stderr ?? '',
    };
  };

  return {
    adbPath,
    dryRun,
    timeoutMs: options.timeoutMs ?? 30000,
    logger: options.logger ?? silentLogger(),
    calls,
    printed,
    buildArgs,
    describe,
    print: line => {
      printed.push(line);
    },
    run: (args, runOptions = {}): CommandResult => {
      const { exitCode, stdout, stderr } = respond(args, runOptions);
      return { exitCode, stdout: stdout.toString('utf-8'), stderr };
    },
    runBinary: (args, runOptions = {}) => respond(args, runOptions),
  };
}

/**
 * Collects pino JSON lines so tests can assert on what was logged.
 */
export function createCapturingLogger(level: pino.Level = 'debug'): {
  logger: Logger;
  messages: (minLevel?: number) => string[];
} {
  const lines: Array<{ level: number; msg: string }> = [];
  const logger = pino(
    { level, base: {} },
    {
      write(chunk: string) {
        const parsed: unknown = JSON.parse(chunk);
        if (typeof parsed === 'object' && parsed !== null && 'level' in parsed && 'msg' in parsed) {
          lines.push({ level: Number(parsed.level), msg: String(parsed.msg) });
        }
      },
    }
  );

  return {
    logger,
    messages: (minLevel = 0) => lines.filter(line => line.level >= minLevel).map(line => line.msg),
  };
}
