import type { ActionRequest, ActionResult } from '@domain/types/action.js';

/**
 * Capability interface over a remote browser-automation agent.
 *
 * These are the only verbs the workflow ever needs. Any automation backend
 * (a hosted computer-use agent, a local headless browser, a replayed capture)
 * can sit behind it without the orchestrator noticing.
 *
 * Implementations reject (throw) when the agent refuses an action or cannot
 * find its target; they do not retry and do not enforce timeouts.
 */
export interface IActionBackend {
  /** Human-readable name of this backend (e.g. 'http', 'replay') */
  readonly name: string;

  /** Start a fresh browser session and return its identifier. */
  open(): Promise<string>;
  navigate(sessionId: string, url: string): Promise<void>;
  click(sessionId: string, target: string): Promise<void>;
  type(sessionId: string, target: string, text: string): Promise<void>;
  readText(sessionId: string, target: string): Promise<string>;
  /** Base64-encoded PNG of the current viewport. */
  screenshot(sessionId: string): Promise<string>;
  close(sessionId: string): Promise<void>;
}

/**
 * A browser session exclusively owned by one in-flight run.
 * Obtained from `IActionGateway.openSession()`; must be closed on every exit path.
 */
export interface BrowserSession {
  readonly id: string;

  /**
   * Perform one action and report its outcome. Never retries and never
   * throws for backend faults; those come back as `failure` or `timeout`.
   */
  perform(request: ActionRequest, timeoutMs: number): Promise<ActionResult>;

  /** Release the remote session. Safe to call more than once. */
  close(): Promise<void>;
}

export interface IActionGateway {
  readonly name: string;
  openSession(): Promise<BrowserSession>;
}
