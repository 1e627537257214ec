import { RunInProgressError } from '@shared/lib/errors.js';
import { SessionLock } from './session-lock.js';

describe('SessionLock', () => {
  it('rejects a second holder', () => {
    const lock = new SessionLock();
    lock.acquire('run-a');
    expect(() => lock.acquire('run-b')).toThrow(RunInProgressError);
    expect(lock.activeRunId).toBe('run-a');
  });

  it('frees the session on release, once', () => {
    const lock = new SessionLock();
    const lease = lock.acquire('run-a');
    lease.release();
    const next = lock.acquire('run-b');
    lease.release();
    expect(lock.activeRunId).toBe('run-b');
    next.release();
    expect(lock.activeRunId).toBeNull();
  });

  it('hands the session to queued runs in arrival order', async () => {
    const lock = new SessionLock();
    const first = lock.acquire('run-a');
    const order: string[] = [];

    const b = lock.acquireQueued('run-b').then((lease) => {
      order.push(lease.runId);
      return lease;
    });
    const c = lock.acquireQueued('run-c').then((lease) => {
      order.push(lease.runId);
      return lease;
    });
    expect(lock.queueLength).toBe(2);

    first.release();
    (await b).release();
    (await c).release();

    expect(order).toEqual(['run-b', 'run-c']);
    expect(lock.activeRunId).toBeNull();
  });
});
