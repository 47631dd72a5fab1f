import { z } from 'zod';

// Process-level exit codes
export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  ADB_NOT_FOUND: 2,
  DEVICE_SELECTION: 3,
  INVALID_ARGUMENTS: 4,
  TIMEOUT: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// Device information interfaces
export type DeviceState = 'device' | 'offline' | 'unauthorized';

export interface AndroidDevice {
  id: string;
  state: DeviceState;
  model?: string;
  transportId?: string;
  android?: string;
  sdk?: string;
}

export interface DeviceDetails {
  serial: string;
  model: string;
  brand: string;
  android: string;
  sdk: string;
  abi: string;
  root: 'yes' | 'no';
  battery: string;
  storage: string;
  mem: string;
}

export interface PackageDetails {
  package: string;
  versionName: string;
  versionCode: string;
  uid: string;
  grantedPermissions: string[];
  path: string;
  mainActivity: string;
}

// Result of a one-shot adb invocation
export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface BinaryCommandResult {
  exitCode: number;
  stdout: Buffer;
  stderr: string;
}

export interface DeviceCommandResult extends CommandResult {
  deviceId: string;
}

// Streaming process interfaces
export interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** True when the session delivered its cancellation signal. */
  cancelled: boolean;
  stderr: string;
}

// Log analysis interfaces
export const LOG_LEVELS = ['V', 'D', 'I', 'W', 'E', 'F'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LevelCounts = Record<LogLevel, number>;

export interface LogRecord {
  raw: string;
  level?: LogLevel;
  tag?: string;
}

export interface TagCount {
  tag: string;
  count: number;
}

export interface AnalysisReport {
  readonly source: string;
  readonly analyzedAt: string;
  readonly lines: number;
  readonly levels: Readonly<LevelCounts>;
  readonly fatals: number;
  readonly topTags: readonly TagCount[];
}

// Error handling interfaces
export interface CliErrorShape {
  code: string;
  message: string;
  exitCode: ExitCode;
  details?: unknown;
  suggestion?: string;
}

export class CliError extends Error implements CliErrorShape {
  code: string;
  exitCode: ExitCode;
  details?: unknown;
  suggestion?: string;

  constructor(
    code: string,
    message: string,
    exitCode: ExitCode = EXIT_CODES.FAILURE,
    details?: unknown,
    suggestion?: string
  ) {
    super(message);
    this.name = 'CliError';
    this.code = code;
    this.exitCode = exitCode;
    this.details = details;
    this.suggestion = suggestion;
  }
}

export class LaunchError extends CliError {
  constructor(command: string, reason?: string, suggestion?: string) {
    super(
      'LAUNCH_FAILED',
      `Failed to launch '${command}'${reason ? `: ${reason}` : ''}`,
      EXIT_CODES.ADB_NOT_FOUND,
      { command, reason },
      suggestion
    );
    this.name = 'LaunchError';
  }
}

export class ADBNotFoundError extends LaunchError {
  constructor(searchedPath?: string) {
    super(
      searchedPath ?? 'adb',
      searchedPath ? 'adb not found at the given path' : 'adb not found in PATH',
      'Install Android SDK Platform Tools and ensure adb is in your PATH, or pass --adb <path>'
    );
    this.code = 'ADB_NOT_FOUND';
    this.name = 'ADBNotFoundError';
  }
}

export class SelectionError extends CliError {
  constructor(code: string, message: string, details?: unknown, suggestion?: string) {
    super(code, message, EXIT_CODES.DEVICE_SELECTION, details, suggestion);
    this.name = 'SelectionError';
  }
}

export class NoDevicesFoundError extends SelectionError {
  constructor() {
    super(
      'NO_DEVICES_FOUND',
      "No connected devices in state 'device'",
      null,
      'Connect an Android device or start an emulator and ensure USB debugging is enabled'
    );
    this.name = 'NoDevicesFoundError';
  }
}

export class DeviceNotFoundError extends SelectionError {
  constructor(deviceId: string) {
    super(
      'DEVICE_NOT_FOUND',
      `Device '${deviceId}' not found or not in state 'device'`,
      { deviceId },
      'Please check if the device is connected and authorized'
    );
    this.name = 'DeviceNotFoundError';
  }
}

export class MultipleDevicesError extends SelectionError {
  constructor(devices: AndroidDevice[]) {
    const candidates = devices.map(device => `- ${device.id} (${device.model || 'n/a'})`);
    super(
      'MULTIPLE_DEVICES',
      `Multiple devices connected. Specify --serial. Candidates:\n${candidates.join('\n')}`,
      { devices: devices.map(device => device.id) }
    );
    this.name = 'MultipleDevicesError';
  }
}

export class ArgumentError extends CliError {
  constructor(message: string, details?: unknown) {
    super('INVALID_ARGUMENTS', message, EXIT_CODES.INVALID_ARGUMENTS, details);
    this.name = 'ArgumentError';
  }
}

export class OperationTimeout extends CliError {
  constructor(message: string, timeoutMs: number, details?: Record<string, unknown>) {
    super('OPERATION_TIMEOUT', message, EXIT_CODES.TIMEOUT, { timeoutMs, ...details });
    this.name = 'OperationTimeout';
  }
}

export class LaunchTimeout extends OperationTimeout {
  constructor(command: string, timeoutMs: number) {
    super(`'${command}' did not start within ${timeoutMs} ms`, timeoutMs, { command });
    this.code = 'LAUNCH_TIMEOUT';
    this.name = 'LaunchTimeout';
  }
}

export class CommandFailedError extends CliError {
  constructor(message: string, details?: unknown, suggestion?: string) {
    super('ADB_COMMAND_FAILED', message, EXIT_CODES.FAILURE, details, suggestion);
    this.name = 'CommandFailedError';
  }
}

export class SourceReadError extends CliError {
  constructor(source: string, reason: string) {
    super('SOURCE_READ_FAILED', `Failed to read '${source}': ${reason}`, EXIT_CODES.FAILURE, {
      source,
    });
    this.name = 'SourceReadError';
  }
}

export class ScreenshotCaptureError extends CliError {
  constructor(deviceId: string, reason: string) {
    super(
      'SCREENSHOT_CAPTURE_FAILED',
      `Failed to capture screenshot from device '${deviceId}': ${reason}`,
      EXIT_CODES.FAILURE,
      { deviceId },
      'Please ensure the device is connected and screen is unlocked'
    );
    this.name = 'ScreenshotCaptureError';
  }
}

// Command input schemas
const nonEmpty = z.string().trim().min(1);
const coordinate = z.coerce.number().int().nonnegative();
const port = z.coerce.number().int().min(1).max(65535).default(5555);

export const GlobalOptionsSchema = z.object({
  adb: nonEmpty.optional(),
  serial: nonEmpty.optional(),
  timeout: z.coerce
    .number()
    .int()
    .positive()
    .optional()
    .describe('Timeout in seconds for one-shot adb commands.'),
  dryRun: z.boolean().default(false),
  verbose: z.boolean().default(false),
  quiet: z.boolean().default(false),
  logFile: nonEmpty.optional(),
});

export const JsonOutputSchema = z.object({
  json: z.boolean().default(false),
});

export const InstallInputSchema = z.object({
  apk: nonEmpty.describe('Path to the .apk file.'),
  replace: z.boolean().default(false),
  downgrade: z.boolean().default(false),
  grantAll: z.boolean().default(false),
});

export const UninstallInputSchema = z.object({
  package: nonEmpty,
  keepData: z.boolean().default(false),
});

export const ScreenshotInputSchema = z.object({
  out: nonEmpty.optional(),
});

export const RecordInputSchema = z.object({
  duration: z.coerce.number().int().optional().describe('Recording length in seconds (1-180).'),
  bitrate: z.coerce.number().positive().optional().describe('Bit rate in Mbit/s.'),
  out: nonEmpty.optional(),
});

export const LogcatInputSchema = z.object({
  out: nonEmpty.optional(),
  since: nonEmpty.optional().describe('Relative ("5m", "2h") or ISO-8601 start time.'),
  filter: z
    .array(z.string().regex(/^[^\s:]+:[VDIWEFS*]$/, 'filter must look like tag:level'))
    .default([]),
  clear: z.boolean().default(false),
  duration: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(0)
    .describe('Seconds to capture; 0 captures until interrupted.'),
});

export const AnalyzeLogsInputSchema = z.object({
  file: nonEmpty,
  json: z.boolean().default(false),
});

export const AppStartInputSchema = z
  .object({
    package: nonEmpty.optional(),
    activity: nonEmpty.optional(),
    action: nonEmpty.optional(),
    data: nonEmpty.optional(),
    extra: z.array(z.string().regex(/^[^=]+=/, 'extras must look like key=value')).default([]),
  })
  .refine(input => Boolean(input.package || input.action || input.activity?.includes('/')), {
    message: 'Specify --package (optionally with --activity) or --action',
  });

export const PackageInputSchema = z.object({
  package: nonEmpty,
});

export const GrantPermsInputSchema = z.object({
  package: nonEmpty,
  perms: z.array(nonEmpty).min(1),
});

export const TapInputSchema = z.object({
  x: coordinate,
  y: coordinate,
});

export const TextInputSchema = z.object({
  text: z.string().min(1),
});

export const KeyInputSchema = z.object({
  key: nonEmpty.describe('Key code, e.g. KEYCODE_BACK or 4.'),
});

export const SwipeInputSchema = z.object({
  x1: coordinate,
  y1: coordinate,
  x2: coordinate,
  y2: coordinate,
  duration: z.coerce.number().int().positive().optional(),
});

export const ShellInputSchema = z.object({
  command: z.array(z.string()).min(1, 'Pass the shell command after --'),
  root: z.boolean().default(false),
});

export const PullInputSchema = z.object({
  remote: nonEmpty,
  out: nonEmpty.optional(),
});

export const PushInputSchema = z.object({
  src: nonEmpty,
  remote: nonEmpty,
});

export const TcpipEnableInputSchema = z.object({
  port,
});

export const TcpipConnectInputSchema = z.object({
  host: nonEmpty,
  port,
});

export const ScreenSizeInputSchema = z.object({
  set: z
    .string()
    .regex(/^\d+x\d+$/, 'size must look like WIDTHxHEIGHT')
    .optional(),
});

export const ScreenDensityInputSchema = z.object({
  set: z.coerce.number().int().positive().optional(),
});

export const ScreenRotateInputSchema = z
  .object({
    landscape: z.boolean().default(false),
    portrait: z.boolean().default(false),
    unlock: z.boolean().default(false),
  })
  .refine(input => [input.landscape, input.portrait, input.unlock].filter(Boolean).length === 1, {
    message: 'Specify exactly one of --landscape, --portrait or --unlock',
  });

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;
export type InstallInput = z.infer<typeof InstallInputSchema>;
export type RecordInput = z.infer<typeof RecordInputSchema>;
export type LogcatInput = z.infer<typeof LogcatInputSchema>;
export type AppStartInput = z.infer<typeof AppStartInputSchema>;
export type SwipeInput = z.infer<typeof SwipeInputSchema>;
export type ScreenRotateInput = z.infer<typeof ScreenRotateInputSchema>;
