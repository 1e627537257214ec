import { completedReport, failedReport } from '@shared/testing/run-report-fixtures.js';
import {
  RunReportDocumentSchema,
  fromRunReportDocument,
  isTerminalState,
  toRunReportDocument,
} from './run-report.js';

describe('run report documents', () => {
  it('store an infinite payback as null and read it back as Infinity', () => {
    const base = completedReport();
    const profitability = base.profitability;
    if (!profitability) throw new Error('fixture has financials');
    const report = completedReport({ profitability: { ...profitability, paybackYears: Infinity } });

    const doc = RunReportDocumentSchema.parse(toRunReportDocument(report));
    expect(doc.profitability?.paybackYears).toBeNull();

    const restored = fromRunReportDocument(doc);
    expect(restored.profitability?.paybackYears).toBe(Infinity);
    expect(restored.sealed).toBe(true);
  });

  it('validate a failed run with its cause', () => {
    const doc = RunReportDocumentSchema.parse(toRunReportDocument(failedReport()));
    expect(doc.cause).toEqual({
      step: 'navigate',
      kind: 'TransientGatewayError',
      message: 'Timed out: navigate https://estimator.test/',
    });
    expect(doc.profitability).toBeNull();
  });

  it('reject a run id that is not a uuid', () => {
    const doc = toRunReportDocument(completedReport({ runId: 'run-1' }));
    expect(RunReportDocumentSchema.safeParse(doc).success).toBe(false);
  });
});

describe('isTerminalState', () => {
  it('accepts only the three end states', () => {
    expect(isTerminalState('Completed')).toBe(true);
    expect(isTerminalState('PartiallyCompleted')).toBe(true);
    expect(isTerminalState('Failed')).toBe(true);
    expect(isTerminalState('Publishing')).toBe(false);
  });
});
