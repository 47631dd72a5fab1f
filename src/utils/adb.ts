import { spawnSync } from 'child_process';
import fs from 'fs';
import path from 'path';
import type { Logger } from 'pino';
import {
  ADBNotFoundError,
  BinaryCommandResult,
  CommandFailedError,
  CommandResult,
  LaunchError,
  OperationTimeout,
} from '../types';
import { errorCode } from './error';

// Default timeout for one-shot ADB commands (30 seconds)
export const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_BINARY_MAX_BUFFER = 50 * 1024 * 1024;

export interface RunOptions {
  serial?: string;
  timeoutMs?: number;
}

/**
 * Everything the device commands need from the adb executor. The real
 * implementation is `AdbRunner`; tests substitute a scripted fake.
 */
export interface CommandRunner {
  readonly adbPath: string;
  readonly dryRun: boolean;
  readonly timeoutMs: number;
  readonly logger: Logger;
  buildArgs(args: readonly string[], serial?: string): string[];
  describe(args: readonly string[], serial?: string): string;
  run(args: readonly string[], options?: RunOptions): CommandResult;
  runBinary(args: readonly string[], options?: RunOptions): BinaryCommandResult;
  print(line: string): void;
}

export interface AdbRunnerOptions {
  adbPath: string;
  logger: Logger;
  dryRun?: boolean;
  timeoutMs?: number;
  stdout?: NodeJS.WritableStream;
}

export function adbExecutableName(platform: NodeJS.Platform = process.platform): string {
  return platform === 'win32' ? 'adb.exe' : 'adb';
}

export function escapeShellArg(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function isFile(candidate: string): boolean {
  return fs.existsSync(candidate) && fs.statSync(candidate).isFile();
}

function isDirectory(candidate: string): boolean {
  return fs.existsSync(candidate) && fs.statSync(candidate).isDirectory();
}

/**
 * Locate the adb executable: an explicit file, an explicit platform-tools
 * directory, or the first match on PATH.
 */
export function resolveAdbPath(
  explicitPath?: string,
  options: { env?: NodeJS.ProcessEnv; platform?: NodeJS.Platform } = {}
): string {
  const executable = adbExecutableName(options.platform);

  if (explicitPath) {
    const resolved = path.resolve(explicitPath);

    if (isDirectory(resolved)) {
      const candidate = path.join(resolved, executable);
      if (isFile(candidate)) {
        return candidate;
      }
    } else if (isFile(resolved)) {
      return resolved;
    }

    throw new ADBNotFoundError(explicitPath);
  }

  const env = options.env ?? process.env;
  const searchPath = env.PATH ?? env.Path ?? '';

  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, executable);
    if (isFile(candidate)) {
      return candidate;
    }
  }

  throw new ADBNotFoundError();
}

export class AdbRunner implements CommandRunner {
  readonly adbPath: string;
  readonly dryRun: boolean;
  readonly timeoutMs: number;
  readonly logger: Logger;
  private readonly stdout: NodeJS.WritableStream;

  constructor(options: AdbRunnerOptions) {
    this.adbPath = options.adbPath;
    this.logger = options.logger;
    this.dryRun = options.dryRun ?? false;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.stdout = options.stdout ?? process.stdout;
  }

  buildArgs(args: readonly string[], serial?: string): string[] {
    return serial ? ['-s', serial, ...args] : [...args];
  }

  describe(args: readonly string[], serial?: string): string {
    return [this.adbPath, ...this.buildArgs(args, serial)].join(' ');
  }

  print(line: string): void {
    this.stdout.write(`${line}\n`);
  }

  // Execute ADB command with error handling
  run(args: readonly string[], options: RunOptions = {}): CommandResult {
    const result = this.execute(args, options);
    return {
      exitCode: result.exitCode,
      stdout: result.stdout.toString('utf-8'),
      stderr: result.stderr,
    };
  }

  // Execute ADB command that returns binary data
  runBinary(args: readonly string[], options: RunOptions = {}): BinaryCommandResult {
    return this.execute(args, options);
  }

  private execute(args: readonly string[], options: RunOptions): BinaryCommandResult {
    const command = this.describe(args, options.serial);
    this.logger.debug(`ADB CMD: ${command}`);

    if (this.dryRun) {
      this.print(`[DRY-RUN] ${command}`);
      return { exitCode: 0, stdout: Buffer.alloc(0), stderr: '' };
    }

    const timeout = options.timeoutMs ?? this.timeoutMs;
    const result = spawnSync(this.adbPath, this.buildArgs(args, options.serial), {
      stdio: 'pipe',
      timeout,
      maxBuffer: DEFAULT_BINARY_MAX_BUFFER,
      windowsHide: true,
    });

    if (result.error) {
      switch (errorCode(result.error)) {
        case 'ETIMEDOUT':
          throw new OperationTimeout(
            `Command exceeded timeout of ${timeout / 1000} s: ${command}`,
            timeout,
            { command }
          );
        case 'ENOENT':
          throw new LaunchError(this.adbPath, 'executable not found');
        default:
          throw new CommandFailedError(`Failed to run command: ${command}\n${result.error.message}`, {
            command,
          });
      }
    }

    const stdout = result.stdout ?? Buffer.alloc(0);
    const stderr = result.stderr ? result.stderr.toString('utf-8') : '';
    // Killed by a signal: no status, report as a generic failure
    const exitCode = result.status ?? 1;

    this.logger.debug({ exitCode, bytes: stdout.length }, `ADB CMD finished: ${command}`);

    return { exitCode, stdout, stderr };
  }
}
