import type { Logger } from 'pino';
import { CommandFailedError, CommandResult, EXIT_CODES, ExitCode, GlobalOptions } from './types';
import { AdbRunner, CommandRunner, resolveAdbPath } from './utils/adb';
import { Config } from './utils/config';
import { errorCode, exitCodeForError, formatErrorMessage } from './utils/error';
import { createLoggingContext, LoggingContext } from './utils/logger';

export interface CliIO {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

export interface CliContextOptions {
  io: CliIO;
  config: Config;
  configWarnings?: string[];
  env?: NodeJS.ProcessEnv;
  color?: boolean;
}

/**
 * State of a single CLI run: resolved options, the logging context and the
 * adb runner, which is only created once a command needs it.
 */
export class CliContext {
  readonly io: CliIO;
  readonly config: Config;
  exitCode: ExitCode = EXIT_CODES.SUCCESS;
  /** Set by commands that treat Ctrl+C as a normal end. */
  interruptHandled = false;

  private globals?: GlobalOptions;
  private logging?: LoggingContext;
  private adbRunner?: CommandRunner;
  private readonly options: CliContextOptions;

  constructor(options: CliContextOptions) {
    this.io = options.io;
    this.config = options.config;
    this.options = options;
  }

  setup(globals: GlobalOptions): void {
    this.globals = globals;
    this.logging = createLoggingContext({
      verbose: globals.verbose,
      quiet: globals.quiet,
      logFile: globals.logFile ?? this.config.logFile,
      stderr: this.io.stderr,
      color: this.options.color,
    });

    for (const warning of this.options.configWarnings ?? []) {
      this.logging.logger.warn(warning);
    }
  }

  get logger(): Logger | undefined {
    return this.logging?.logger;
  }

  get serial(): string | undefined {
    return this.globals?.serial ?? this.config.defaultSerial;
  }

  get runner(): CommandRunner {
    if (!this.adbRunner) {
      const logger = this.logging?.logger;
      if (!this.globals || !logger) {
        throw new Error('CLI context used before setup');
      }

      const adbPath = resolveAdbPath(this.globals.adb ?? this.config.adbPath, {
        env: this.options.env,
      });
      const timeoutSeconds = this.globals.timeout ?? this.config.defaultTimeout;

      this.adbRunner = new AdbRunner({
        adbPath,
        logger,
        dryRun: this.globals.dryRun,
        timeoutMs: timeoutSeconds * 1000,
        stdout: this.io.stdout,
      });
    }

    return this.adbRunner;
  }

  print(text: string): void {
    if (text) {
      this.io.stdout.write(`${text}\n`);
    }
  }

  /**
   * Print the output of a one-shot adb command, or `fallback` when it printed
   * nothing. A non-zero exit becomes a CommandFailedError carrying whatever
   * the command printed.
   */
  printResult(result: CommandResult, fallback = ''): void {
    const output = result.stdout.trim() || result.stderr.trim();

    if (result.exitCode !== 0) {
      throw new CommandFailedError(
        `adb exited with code ${result.exitCode}${output ? `: ${output}` : ''}`,
        { exitCode: result.exitCode }
      );
    }

    this.print(output || fallback);
  }

  reportError(error: unknown): ExitCode {
    const message = formatErrorMessage(error);
    const logger = this.logging?.logger;

    if (logger) {
      logger.error({ code: errorCode(error) }, message);
      if (error instanceof Error && error.stack) {
        logger.debug(error.stack);
      }
    } else {
      this.io.stderr.write(`Error: ${message}\n`);
    }

    return exitCodeForError(error);
  }

  close(): void {
    this.logging?.close();
  }
}
