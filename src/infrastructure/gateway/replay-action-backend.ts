import type { IActionBackend } from '@domain/ports/action-gateway.js';

/**
 * Offline backend that replays a captured results page.
 *
 * Every interaction succeeds immediately and `readText` returns the captured
 * page, whatever the target. Used for dry runs of the full workflow and by
 * the CLI tests.
 */
export class ReplayActionBackend implements IActionBackend {
  readonly name = 'replay';

  /** Interactions seen so far, e.g. `navigate https://…`, `click Visualize results`. */
  readonly journal: string[] = [];

  private nextSession = 1;
  private readonly openSessions = new Set<string>();

  constructor(private readonly page: string) {}

  async open(): Promise<string> {
    const id = `replay-${this.nextSession++}`;
    this.openSessions.add(id);
    return id;
  }

  async navigate(sessionId: string, url: string): Promise<void> {
    this.assertOpen(sessionId);
    this.journal.push(`navigate ${url}`);
  }

  async click(sessionId: string, target: string): Promise<void> {
    this.assertOpen(sessionId);
    this.journal.push(`click ${target}`);
  }

  async type(sessionId: string, target: string, text: string): Promise<void> {
    this.assertOpen(sessionId);
    this.journal.push(`type ${target}=${text}`);
  }

  async readText(sessionId: string, target: string): Promise<string> {
    this.assertOpen(sessionId);
    this.journal.push(`read ${target}`);
    return this.page;
  }

  async screenshot(sessionId: string): Promise<string> {
    this.assertOpen(sessionId);
    this.journal.push('screenshot');
    return '';
  }

  async close(sessionId: string): Promise<void> {
    this.openSessions.delete(sessionId);
  }

  private assertOpen(sessionId: string): void {
    if (!this.openSessions.has(sessionId)) {
      throw new Error(`Unknown or closed replay session: ${sessionId}`);
    }
  }
}
