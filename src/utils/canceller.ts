import { ChildProcess } from 'child_process';

/**
 * Sends the graceful stop request to a child process. Returns whether the
 * signal was delivered.
 */
export interface Canceller {
  readonly name: 'interrupt' | 'terminate';
  cancel(child: ChildProcess): boolean;
}

// Ctrl-C equivalent; lets logcat and friends flush before exiting
export const interruptCanceller: Canceller = {
  name: 'interrupt',
  cancel: child => child.kill('SIGINT'),
};

// Windows has no SIGINT for child processes, kill() maps to TerminateProcess there
export const terminateCanceller: Canceller = {
  name: 'terminate',
  cancel: child => child.kill('SIGTERM'),
};

export function cancellerForPlatform(platform: NodeJS.Platform = process.platform): Canceller {
  return platform === 'win32' ? terminateCanceller : interruptCanceller;
}

/** Single-use latch: only the first `tryFire` call wins. */
export class CancellationLatch {
  private fired = false;

  get isFired(): boolean {
    return this.fired;
  }

  tryFire(): boolean {
    if (this.fired) {
      return false;
    }
    this.fired = true;
    return true;
  }
}
