import { RunInProgressError } from '@shared/lib/errors.js';

/** Exclusive claim on the browser session for one run. */
export interface SessionLease {
  readonly runId: string;
  /** Hand the session back. Idempotent. */
  release(): void;
}

interface Waiter {
  runId: string;
  grant: (lease: SessionLease) => void;
}

/**
 * Guards the single remote browser session. At most one run holds it; a
 * second run is either rejected (`acquire`) or queued in arrival order
 * (`acquireQueued`). Runs never interleave actions on the same session.
 */
export class SessionLock {
  private holder: string | null = null;
  private readonly waiters: Waiter[] = [];

  get activeRunId(): string | null {
    return this.holder;
  }

  get queueLength(): number {
    return this.waiters.length;
  }

  /**
   * Take the session or fail immediately.
   * @throws RunInProgressError when another run holds it
   */
  acquire(runId: string): SessionLease {
    if (this.holder !== null) {
      throw new RunInProgressError(this.holder);
    }
    return this.grant(runId);
  }

  /** Take the session, waiting behind earlier callers if it is busy. */
  acquireQueued(runId: string): Promise<SessionLease> {
    if (this.holder === null) {
      return Promise.resolve(this.grant(runId));
    }
    return new Promise((resolve) => {
      this.waiters.push({ runId, grant: resolve });
    });
  }

  private grant(runId: string): SessionLease {
    this.holder = runId;
    let released = false;
    return {
      runId,
      release: () => {
        if (released) return;
        released = true;
        this.handOver();
      },
    };
  }

  private handOver(): void {
    const next = this.waiters.shift();
    if (next) {
      next.grant(this.grant(next.runId));
    } else {
      this.holder = null;
    }
  }
}
