import type { RunReport } from '@domain/types/run-report.js';
import type { SinkResult } from '@domain/types/sink.js';

/**
 * Port interface for best-effort publishers run after the core computation.
 *
 * A sink receives a frozen snapshot of the run report and answers with a
 * single success/failure signal. Whatever retrying it does internally is its
 * own business. Financial fields may be null; sinks must cope.
 */
export interface ISink {
  readonly name: string;
  publish(report: RunReport): Promise<SinkResult>;
}
