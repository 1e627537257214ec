import type { ActionRequest, ActionResult } from '@domain/types/action.js';
import type { BrowserSession, IActionBackend, IActionGateway } from '@domain/ports/action-gateway.js';
import { InvalidActionError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';

const TIMED_OUT = Symbol('timed-out');

function validateRequest(request: ActionRequest, timeoutMs: number): void {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new InvalidActionError(`timeoutMs must be positive (got ${timeoutMs})`);
  }
  if (request.kind !== 'read' && request.target.trim() === '') {
    throw new InvalidActionError(`A ${request.kind} action needs a target`);
  }
}

/**
 * Typed wrapper over a remote browser-automation backend.
 *
 * Each call maps one ActionRequest onto the backend's primitives, bounds it
 * by `timeoutMs`, and turns every backend fault into an ActionResult. It
 * never retries; classification and retry belong to the caller.
 */
export class ActionGatewayAdapter implements IActionGateway {
  readonly name: string;

  constructor(
    private readonly backend: IActionBackend,
    private readonly now: () => number = Date.now,
  ) {
    this.name = backend.name;
  }

  async openSession(): Promise<BrowserSession> {
    const id = await this.backend.open();
    return new GatewaySession(this, this.backend, id);
  }

  /**
   * @throws InvalidActionError for a non-positive timeout or a missing target
   */
  async perform(sessionId: string, request: ActionRequest, timeoutMs: number): Promise<ActionResult> {
    validateRequest(request, timeoutMs);
    const startedAt = this.now();
    const elapsed = () => Math.max(0, this.now() - startedAt);

    const action = this.dispatch(sessionId, request);
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
    });

    try {
      const payload = await Promise.race([action, timeout]);
      if (payload === TIMED_OUT) {
        // The backend call keeps running; its late outcome is dropped.
        action.catch((err: unknown) => {
          logger.debug('Late gateway failure after timeout', {
            kind: request.kind,
            error: err instanceof Error ? err.message : String(err),
          });
        });
        return { status: 'timeout', payload: null, rawError: null, durationMs: elapsed() };
      }
      return { status: 'success', payload, rawError: null, durationMs: elapsed() };
    } catch (err) {
      return {
        status: 'failure',
        payload: null,
        rawError: err instanceof Error ? err.message : String(err),
        durationMs: elapsed(),
      };
    } finally {
      clearTimeout(timer);
    }
  }

  private async dispatch(sessionId: string, request: ActionRequest): Promise<string | null> {
    switch (request.kind) {
      case 'navigate':
        await this.backend.navigate(sessionId, request.target);
        return null;
      case 'input':
        await this.backend.type(sessionId, request.target, request.payload.text);
        return null;
      case 'submit':
        for (const field of request.payload.fields) {
          await this.backend.type(sessionId, field.target, field.value);
        }
        await this.backend.click(sessionId, request.target);
        return null;
      case 'read':
        if (request.payload?.capture === 'screenshot') {
          return this.backend.screenshot(sessionId);
        }
        return this.backend.readText(sessionId, request.target || 'body');
    }
  }
}

/** A session opened through ActionGatewayAdapter. */
export class GatewaySession implements BrowserSession {
  private closed = false;

  constructor(
    private readonly adapter: ActionGatewayAdapter,
    private readonly backend: IActionBackend,
    readonly id: string,
  ) {}

  perform(request: ActionRequest, timeoutMs: number): Promise<ActionResult> {
    if (this.closed) {
      return Promise.reject(new InvalidActionError(`Browser session ${this.id} is closed`));
    }
    return this.adapter.perform(this.id, request, timeoutMs);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.backend.close(this.id);
  }
}
