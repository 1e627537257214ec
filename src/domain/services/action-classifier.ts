import type { ActionRequest, ActionResult } from '@domain/types/action.js';
import {
  NonRetryableGatewayError,
  TransientGatewayError,
  type GatewayError,
} from '@shared/lib/errors.js';

/**
 * Raw error text that marks a navigation failure as temporary: network
 * resets, DNS hiccups, upstream 5xx. Anything else that fails is taken as
 * a structural mismatch (missing target, rejected action).
 */
const TRANSIENT_MARKERS = [
  /net::ERR_/i,
  /ECONNRESET|ECONNREFUSED|ETIMEDOUT|EAI_AGAIN|ENOTFOUND/,
  /\b5\d\d\b/,
  /temporar/i,
  /socket hang up/i,
];

function isTransientFailure(request: ActionRequest, rawError: string | null): boolean {
  if (request.kind !== 'navigate' || rawError === null) return false;
  return TRANSIENT_MARKERS.some((re) => re.test(rawError));
}

/**
 * Classify a non-success gateway result.
 *
 * - `timeout` → TransientGatewayError (retryable)
 * - `failure` on a navigate whose error looks temporary → TransientGatewayError
 * - any other `failure` → NonRetryableGatewayError
 */
export function classifyActionResult(request: ActionRequest, result: ActionResult): GatewayError {
  const where = `${request.kind} ${request.target || '(page)'}`;

  if (result.status === 'timeout') {
    return new TransientGatewayError(`Timed out: ${where}`, request.kind, request.target);
  }

  const detail = result.rawError ?? 'action failed';
  if (isTransientFailure(request, result.rawError)) {
    return new TransientGatewayError(`Temporary failure on ${where}: ${detail}`, request.kind, request.target);
  }
  return new NonRetryableGatewayError(`Rejected ${where}: ${detail}`, request.kind, request.target);
}
