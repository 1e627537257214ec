import { z } from 'zod/v4';

export const ActionStatus = z.enum(['success', 'failure', 'timeout']);
export type ActionStatus = z.infer<typeof ActionStatus>;

/** One form field typed before a submit click. */
export interface FormField {
  target: string;
  value: string;
}

export interface NavigateRequest {
  kind: 'navigate';
  /** Absolute URL to open. */
  target: string;
}

export interface InputRequest {
  kind: 'input';
  /** Selector (or agent-readable label) of the field to type into. */
  target: string;
  payload: { text: string };
}

export interface SubmitRequest {
  kind: 'submit';
  /** The control to click once every field has been typed. */
  target: string;
  payload: { fields: FormField[] };
}

export interface ReadRequest {
  kind: 'read';
  /** Region to read; empty means the whole page body. */
  target: string;
  payload?: { capture?: 'text' | 'screenshot' };
}

export type ActionRequest = NavigateRequest | InputRequest | SubmitRequest | ReadRequest;

/**
 * Outcome of a single gateway call. `payload` carries page text (or a base64
 * screenshot) for reads, and is null otherwise.
 */
export interface ActionResult {
  status: ActionStatus;
  payload: string | null;
  rawError: string | null;
  durationMs: number;
}
