import { Writable } from 'stream';
import type { Logger } from 'pino';
import { ArgumentError, ExitStatus } from '../types';
import { ProcessHandle, ProcessSession, ProcessSessionOptions } from './process-session';

export const MAX_CAPTURE_SECONDS = 24 * 60 * 60;

export interface CaptureSessionOptions {
  command: string;
  args: readonly string[];
  sink: Writable;
  /** Whole seconds; 0 captures until cancelled. */
  durationSeconds: number;
  logger: Logger;
  startupTimeoutMs?: number;
  killGraceMs?: number;
  canceller?: ProcessSessionOptions['canceller'];
}

export interface CaptureResult {
  handle: ProcessHandle;
  status: ExitStatus;
  elapsedMs: number;
}

// Bounded or unbounded recording of a streaming command's stdout
export class CaptureSession {
  readonly durationSeconds: number;
  private readonly options: CaptureSessionOptions;
  private readonly session: ProcessSession;

  constructor(options: CaptureSessionOptions) {
    const { durationSeconds } = options;
    if (
      !Number.isInteger(durationSeconds) ||
      durationSeconds < 0 ||
      durationSeconds > MAX_CAPTURE_SECONDS
    ) {
      throw new ArgumentError(
        `Capture duration must be a whole number of seconds between 0 and ${MAX_CAPTURE_SECONDS}`,
        { durationSeconds }
      );
    }

    this.durationSeconds = durationSeconds;
    this.options = options;
    this.session = new ProcessSession({
      logger: options.logger,
      startupTimeoutMs: options.startupTimeoutMs,
      killGraceMs: options.killGraceMs,
      canceller: options.canceller,
    });
  }

  /**
   * Start the process, arm the duration timer and wait for the process to
   * exit. An abort of `signal` (Ctrl-C) takes the same cancellation path as
   * the timer, and both count as a normal end of capture.
   */
  async run(signal?: AbortSignal): Promise<CaptureResult> {
    const { command, args, sink } = this.options;
    const handle = await this.session.start(command, args, sink);

    if (this.durationSeconds > 0) {
      this.session.cancelAfter(this.durationSeconds * 1000);
    }

    const onAbort = () => {
      this.session.cancel();
    };

    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      const status = await this.session.wait();
      return { handle, status, elapsedMs: Date.now() - handle.startedAt.getTime() };
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
