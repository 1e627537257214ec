import { z } from 'zod/v4';
import type { IActionBackend } from '@domain/ports/action-gateway.js';

export interface HttpActionBackendOptions {
  /** Base URL of the automation agent, e.g. `https://agent.example.com/v1`. */
  baseUrl: string;
  /** Sent as a bearer token when present. */
  apiKey?: string;
  /** Injection point for testing. Defaults to the global fetch. */
  fetch?: typeof fetch;
  /** Abort each HTTP request after this long. */
  requestTimeoutMs?: number;
}

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

const OpenSessionResponseSchema = z.object({ sessionId: z.string().min(1) });
const TextResponseSchema = z.object({ text: z.string() });
const ScreenshotResponseSchema = z.object({ image: z.string() });

type AgentAction =
  | { action: 'navigate'; url: string }
  | { action: 'click'; target: string }
  | { action: 'type'; target: string; text: string }
  | { action: 'read_text'; target: string }
  | { action: 'screenshot' };

/** Error text with the low-level network code appended, e.g. `fetch failed (ECONNRESET)`. */
function describeFetchError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const cause: unknown = err.cause;
  if (cause !== null && typeof cause === 'object' && 'code' in cause && typeof cause.code === 'string') {
    return `${err.message} (${cause.code})`;
  }
  return err.message;
}

/**
 * Backend for a remote computer-use agent reachable over HTTP.
 *
 *   POST   {baseUrl}/sessions               → { sessionId }
 *   POST   {baseUrl}/sessions/{id}/actions  → {} | { text } | { image }
 *   DELETE {baseUrl}/sessions/{id}
 *
 * Non-2xx responses and network faults reject with the status or network
 * code in the message, which is what transient classification keys on.
 */
export class HttpActionBackend implements IActionBackend {
  readonly name = 'http';

  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly fetchFn: typeof fetch;
  private readonly requestTimeoutMs: number;

  constructor(options: HttpActionBackendOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.fetchFn = options.fetch ?? fetch;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  async open(): Promise<string> {
    const body = await this.request('POST', '/sessions', {});
    return OpenSessionResponseSchema.parse(body).sessionId;
  }

  async navigate(sessionId: string, url: string): Promise<void> {
    await this.act(sessionId, { action: 'navigate', url });
  }

  async click(sessionId: string, target: string): Promise<void> {
    await this.act(sessionId, { action: 'click', target });
  }

  async type(sessionId: string, target: string, text: string): Promise<void> {
    await this.act(sessionId, { action: 'type', target, text });
  }

  async readText(sessionId: string, target: string): Promise<string> {
    const body = await this.act(sessionId, { action: 'read_text', target });
    return TextResponseSchema.parse(body).text;
  }

  async screenshot(sessionId: string): Promise<string> {
    const body = await this.act(sessionId, { action: 'screenshot' });
    return ScreenshotResponseSchema.parse(body).image;
  }

  async close(sessionId: string): Promise<void> {
    await this.request('DELETE', `/sessions/${encodeURIComponent(sessionId)}`);
  }

  private act(sessionId: string, action: AgentAction): Promise<unknown> {
    return this.request('POST', `/sessions/${encodeURIComponent(sessionId)}/actions`, action);
  }

  private async request(method: 'POST' | 'DELETE', path: string, body?: object): Promise<unknown> {
    const headers: Record<string, string> = { accept: 'application/json' };
    if (body !== undefined) headers['content-type'] = 'application/json';
    if (this.apiKey) headers['authorization'] = `Bearer ${this.apiKey}`;

    let response: Response;
    try {
      response = await this.fetchFn(`${this.baseUrl}${path}`, {
        method,
        headers,
        signal: AbortSignal.timeout(this.requestTimeoutMs),
        ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
      });
    } catch (err) {
      throw new Error(describeFetchError(err));
    }

    const text = await response.text();
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} from agent: ${text.slice(0, 200) || response.statusText}`);
    }
    if (text.trim() === '') return {};
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      throw new Error(`Agent returned a non-JSON body for ${method} ${path}`);
    }
  }
}
