import { ChildProcess, spawn } from 'child_process';
import path from 'path';
import { Readable, Writable } from 'stream';
import { finished } from 'stream/promises';
import type { Logger } from 'pino';
import { CliError, CommandFailedError, ExitStatus, LaunchError, LaunchTimeout } from '../types';
import { CancellationLatch, Canceller, cancellerForPlatform } from './canceller';
import { describeError } from './error';

export const DEFAULT_STARTUP_TIMEOUT_MS = 10000;
export const DEFAULT_KILL_GRACE_MS = 5000;

export interface ProcessHandle {
  readonly pid: number;
  readonly command: string;
  readonly args: readonly string[];
  readonly startedAt: Date;
  readonly sink: Writable;
  deadline?: Date;
}

export interface ProcessSessionOptions {
  logger: Logger;
  startupTimeoutMs?: number;
  /** How long a cancelled process may take to exit before it is killed. */
  killGraceMs?: number;
  canceller?: Canceller;
}

type Outcome = { status: ExitStatus } | { error: CliError };

function whenClosed(stream: Writable): Promise<void> {
  if (stream.closed) {
    return Promise.resolve();
  }
  return new Promise(resolve => stream.once('close', () => resolve()));
}

/**
 * Owns exactly one long-running child process: its stdout is streamed into
 * the caller's sink, and cancellation (timed or manual) goes through a
 * single-use latch so the stop signal is delivered at most once.
 */
export class ProcessSession {
  private readonly logger: Logger;
  private readonly startupTimeoutMs: number;
  private readonly killGraceMs: number;
  private readonly canceller: Canceller;
  private readonly latch = new CancellationLatch();

  private child?: ChildProcess;
  private handle?: ProcessHandle;
  private completion?: Promise<Outcome>;
  private cancelTimer?: NodeJS.Timeout;
  private killTimer?: NodeJS.Timeout;
  private drainTimer?: NodeJS.Timeout;
  private exited = false;
  private readonly stderrChunks: Buffer[] = [];

  constructor(options: ProcessSessionOptions) {
    this.logger = options.logger;
    this.startupTimeoutMs = options.startupTimeoutMs ?? DEFAULT_STARTUP_TIMEOUT_MS;
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.canceller = options.canceller ?? cancellerForPlatform();
  }

  get isRunning(): boolean {
    return Boolean(this.child) && !this.exited;
  }

  async start(command: string, args: readonly string[], sink: Writable): Promise<ProcessHandle> {
    if (this.child) {
      throw new CliError('SESSION_ALREADY_STARTED', 'Process session has already been started');
    }

    this.logger.debug({ command, args }, `spawn ${command} ${args.join(' ')}`);

    let child: ChildProcess;
    try {
      child = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'], windowsHide: true });
    } catch (error) {
      sink.destroy();
      throw new LaunchError(command, describeError(error));
    }

    try {
      await this.waitForSpawn(child, command);
    } catch (error) {
      sink.destroy();
      throw error;
    }

    const { pid, stdout, stderr } = child;
    if (pid === undefined || !stdout || !stderr) {
      sink.destroy();
      throw new LaunchError(command, 'process started without a pid or stdio pipes');
    }

    this.child = child;
    this.handle = { pid, command, args: [...args], startedAt: new Date(), sink };

    stderr.on('data', (chunk: Buffer) => this.stderrChunks.push(chunk));
    this.completion = this.track(child, stdout, sink);

    return this.handle;
  }

  /**
   * Arm a fire-once cancellation `durationMs` from now. Re-arming replaces
   * the previous deadline; after exit or cancellation it does nothing.
   */
  cancelAfter(durationMs: number): void {
    if (!this.handle) {
      throw new CliError('SESSION_NOT_STARTED', 'Process session has not been started');
    }

    if (this.exited || this.latch.isFired) {
      return;
    }

    this.clearCancelTimer();
    this.handle.deadline = new Date(Date.now() + durationMs);
    this.cancelTimer = setTimeout(() => {
      this.cancelTimer = undefined;
      this.cancel();
    }, durationMs);
  }

  /**
   * Request a graceful stop. Returns true only for the call that actually
   * delivered the signal; repeated calls and calls after exit are no-ops.
   */
  cancel(): boolean {
    const child = this.child;
    if (!child || this.exited || !this.latch.tryFire()) {
      return false;
    }

    this.clearCancelTimer();
    this.logger.debug({ pid: child.pid, canceller: this.canceller.name }, 'Cancelling process');
    const delivered = this.canceller.cancel(child);

    this.killTimer = setTimeout(() => {
      this.killTimer = undefined;
      if (!this.exited) {
        this.logger.warn({ pid: child.pid }, 'Force stopping process after grace period');
        child.kill('SIGKILL');
      }
    }, this.killGraceMs);

    return delivered;
  }

  /**
   * Resolve once the process has exited and the sink is flushed and closed.
   * A non-zero exit code is logged, not thrown.
   */
  async wait(): Promise<ExitStatus> {
    if (!this.completion) {
      throw new CliError('SESSION_NOT_STARTED', 'Process session has not been started');
    }

    const outcome = await this.completion;
    if ('error' in outcome) {
      throw outcome.error;
    }
    return outcome.status;
  }

  private waitForSpawn(child: ChildProcess, command: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        child.removeListener('spawn', onSpawn);
        child.removeListener('error', onError);
      };
      const onSpawn = () => {
        cleanup();
        resolve();
      };
      const onError = (error: Error) => {
        cleanup();
        reject(new LaunchError(command, error.message));
      };
      const timer = setTimeout(() => {
        cleanup();
        child.kill('SIGKILL');
        reject(new LaunchTimeout(command, this.startupTimeoutMs));
      }, this.startupTimeoutMs);

      child.once('spawn', onSpawn);
      child.once('error', onError);
    });
  }

  private async track(child: ChildProcess, stdout: Readable, sink: Writable): Promise<Outcome> {
    child.on('error', (error: Error) => {
      this.logger.warn({ pid: child.pid }, `Process error: ${error.message}`);
      this.cancel();
    });

    const exit = new Promise<{ code: number | null; signal: NodeJS.Signals | null }>(resolve => {
      child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        this.exited = true;
        this.clearCancelTimer();
        this.clearKillTimer();
        // A descendant that inherited stdout can keep the pipe open after exit
        this.drainTimer = setTimeout(() => {
          this.drainTimer = undefined;
          if (!stdout.destroyed) {
            this.logger.debug({ pid: child.pid }, 'Output still open after exit, closing it');
            stdout.destroy();
          }
        }, this.killGraceMs);
        resolve({ code, signal });
      });
    });

    let sinkError: string | undefined;
    try {
      await this.copyOutput(stdout, sink);
    } catch (error) {
      sinkError = describeError(error);
      this.logger.warn({ pid: child.pid }, `Output sink failed: ${sinkError}`);
      stdout.destroy();
      this.cancel();
    }

    const { code, signal } = await exit;
    this.clearDrainTimer();

    if (sinkError) {
      return {
        error: new CommandFailedError(`Failed to write process output: ${sinkError}`, {
          pid: child.pid,
        }),
      };
    }

    const stderr = Buffer.concat(this.stderrChunks).toString('utf-8').trim();
    const name = path.basename(this.handle?.command ?? 'process');

    if (code !== 0) {
      // Cancelled or crashed: both are reported the same way
      this.logger.warn(
        { code, signal, stderr },
        `${name} exited with ${code === null ? `signal ${signal}` : `code ${code}`}` +
          (stderr ? `: ${stderr}` : '')
      );
    }

    return { status: { code, signal, cancelled: this.latch.isFired, stderr } };
  }

  /**
   * Copy stdout into the sink until stdout closes, whether it ended or was
   * destroyed, then end the sink and wait for it to close.
   */
  private async copyOutput(stdout: Readable, sink: Writable): Promise<void> {
    const outputClosed = new Promise<void>(resolve => stdout.once('close', () => resolve()));
    const sinkFailed = new Promise<never>((_, reject) => sink.once('error', reject));

    stdout.on('error', (error: Error) => {
      this.logger.debug(`Process output stream failed: ${error.message}`);
    });
    stdout.pipe(sink, { end: false });

    await Promise.race([outputClosed, sinkFailed]);
    stdout.unpipe(sink);
    sink.end();
    await finished(sink, { readable: false });
    await whenClosed(sink);
  }

  private clearCancelTimer(): void {
    if (this.cancelTimer) {
      clearTimeout(this.cancelTimer);
      this.cancelTimer = undefined;
    }
  }

  private clearDrainTimer(): void {
    if (this.drainTimer) {
      clearTimeout(this.drainTimer);
      this.drainTimer = undefined;
    }
  }

  private clearKillTimer(): void {
    if (this.killTimer) {
      clearTimeout(this.killTimer);
      this.killTimer = undefined;
    }
  }
}
