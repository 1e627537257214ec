import { SinkError } from '@shared/lib/errors.js';

export interface WebhookOptions {
  url: string;
  /** Sent as a bearer token when present. */
  token?: string;
  fetch?: typeof fetch;
  /** Abort the request after this long. */
  timeoutMs?: number;
}

export const SINK_REQUEST_TIMEOUT_MS = 15_000;

/**
 * POST a JSON body to a webhook and return the parsed response body, or an
 * empty object for an empty or non-JSON response.
 *
 * @throws SinkError on a network fault, a timeout or a non-2xx status
 */
export async function postJson(sinkName: string, options: WebhookOptions, body: object): Promise<unknown> {
  const fetchFn = options.fetch ?? fetch;
  const headers: Record<string, string> = { 'content-type': 'application/json' };
  if (options.token) headers['authorization'] = `Bearer ${options.token}`;

  let response: Response;
  try {
    response = await fetchFn(options.url, {
      method: 'POST',
      headers,
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(options.timeoutMs ?? SINK_REQUEST_TIMEOUT_MS),
    });
  } catch (err) {
    throw new SinkError(sinkName, `request failed: ${err instanceof Error ? err.message : String(err)}`, err);
  }

  const text = await response.text();
  if (!response.ok) {
    throw new SinkError(sinkName, `webhook answered HTTP ${response.status}`);
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return {};
  }
}
