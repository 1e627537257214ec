import { join } from 'node:path';
import type { IPersistence } from '@domain/ports/persistence.js';
import {
  RunReportDocumentSchema,
  fromRunReportDocument,
  toRunReportDocument,
  type RunReport,
} from '@domain/types/run-report.js';
import { ReportNotFoundError } from '@shared/lib/errors.js';
import { JsonStore } from './json-store.js';

const RUN_ID_PATTERN = /^[0-9a-f-]+$/i;

/**
 * Sealed run reports, one JSON document per run under
 * `.solarcalc/reports/<runId>.json`.
 */
export class ReportStore {
  constructor(
    private readonly reportsDir: string,
    private readonly persistence: IPersistence = JsonStore,
  ) {}

  pathFor(runId: string): string {
    return join(this.reportsDir, `${runId}.json`);
  }

  /** Returns the path written. */
  save(report: RunReport): string {
    const path = this.pathFor(report.runId);
    this.persistence.write(path, toRunReportDocument(report), RunReportDocumentSchema);
    return path;
  }

  /** All stored reports, newest first. */
  list(): RunReport[] {
    return this.persistence
      .list(this.reportsDir, RunReportDocumentSchema)
      .sort((a, b) => b.startedAt.localeCompare(a.startedAt))
      .map(fromRunReportDocument);
  }

  latest(): RunReport | null {
    return this.list()[0] ?? null;
  }

  /**
   * Look a report up by its full id, or by an id prefix that matches exactly one report.
   * @throws ReportNotFoundError
   */
  get(idOrPrefix: string): RunReport {
    if (!RUN_ID_PATTERN.test(idOrPrefix)) throw new ReportNotFoundError(idOrPrefix);

    const path = this.pathFor(idOrPrefix);
    if (this.persistence.exists(path)) {
      return fromRunReportDocument(this.persistence.read(path, RunReportDocumentSchema));
    }

    const matches = this.list().filter((r) => r.runId.startsWith(idOrPrefix));
    const [only] = matches;
    if (matches.length !== 1 || !only) throw new ReportNotFoundError(idOrPrefix);
    return only;
  }
}
