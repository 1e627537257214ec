import type { ISink } from '@domain/ports/sink.js';
import type { RunReport } from '@domain/types/run-report.js';
import type { SinkResult } from '@domain/types/sink.js';
import { logger as defaultLogger, type Logger } from '@shared/lib/logger.js';
import { SinkError } from '@shared/lib/errors.js';

export interface SinkOutcome {
  sinkName: string;
  result: SinkResult;
  durationMs: number;
  /** Set when the sink threw or reported failure. */
  error?: SinkError;
}

export interface SinkDispatcherDeps {
  logger?: Logger;
  now?: () => number;
}

/**
 * Fans a report out to every enabled sink at once.
 *
 * Sinks are isolated from each other: a sink that throws, or resolves with
 * `failure`, is recorded as failed and the rest still run. Outcomes come back
 * in the order the sinks were given.
 */
export class SinkDispatcher {
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(deps: SinkDispatcherDeps = {}) {
    this.logger = deps.logger ?? defaultLogger;
    this.now = deps.now ?? Date.now;
  }

  async publishAll(sinks: readonly ISink[], report: RunReport): Promise<SinkOutcome[]> {
    const settled = await Promise.allSettled(sinks.map((sink) => this.publishOne(sink, report)));

    return settled.map((entry, i) => {
      if (entry.status === 'fulfilled') return entry.value;
      // publishOne already converts errors; this covers anything thrown past it
      const name = sinks[i]?.name ?? `sink-${i}`;
      const error = new SinkError(name, errorMessage(entry.reason), entry.reason);
      return { sinkName: name, result: { status: 'failure', detail: error.message }, durationMs: 0, error };
    });
  }

  private async publishOne(sink: ISink, report: RunReport): Promise<SinkOutcome> {
    const startedAt = this.now();
    try {
      const result = await sink.publish(report);
      const durationMs = Math.max(0, this.now() - startedAt);
      if (result.status === 'failure') {
        const error = new SinkError(sink.name, result.detail ?? 'sink reported failure');
        this.logger.warn('Sink failed', { sink: sink.name, error: error.message });
        return { sinkName: sink.name, result, durationMs, error };
      }
      this.logger.debug('Sink published', { sink: sink.name, detail: result.detail });
      return { sinkName: sink.name, result, durationMs };
    } catch (err) {
      const durationMs = Math.max(0, this.now() - startedAt);
      const error = err instanceof SinkError ? err : new SinkError(sink.name, errorMessage(err), err);
      this.logger.warn('Sink failed', { sink: sink.name, error: error.message });
      return {
        sinkName: sink.name,
        result: { status: 'failure', detail: error.message },
        durationMs,
        error,
      };
    }
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
