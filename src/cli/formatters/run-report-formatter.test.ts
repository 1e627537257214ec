import { RoiCalculator } from '@domain/services/roi-calculator.js';
import { DEFAULT_ECONOMICS } from '@domain/types/economics.js';
import { completedReport, failedReport } from '@shared/testing/run-report-fixtures.js';
import { formatReportList, formatRoiResult, formatRunReport, formatRunReportJson } from './run-report-formatter.js';

describe('formatRunReport', () => {
  it('appends the step log to the text report', () => {
    const lines = formatRunReport(failedReport()).split('\n');
    expect(lines.slice(-4)).toEqual([
      '',
      'Steps:',
      '  x navigate (failure, 3 attempts, 90ms)',
      '      TransientGatewayError: Timed out: navigate https://estimator.test/',
    ]);
  });

  it('marks successful steps', () => {
    const lines = formatRunReport(completedReport()).split('\n');
    expect(lines).toContain('  + navigate (success, 1 attempt, 10ms)');
    expect(lines).toContain('  + compute (success, 1 attempt, 0ms)');
  });

  it('says when no step ran', () => {
    expect(formatRunReport(failedReport({ steps: [] })).endsWith('Steps:\n  (none)')).toBe(true);
  });
});

describe('formatRunReportJson', () => {
  it('writes the storable document', () => {
    const doc: unknown = JSON.parse(formatRunReportJson(completedReport()));
    expect(doc).toMatchObject({ state: 'Completed', profitability: { estimatedSystemCost: 6000 } });
    expect(doc).not.toHaveProperty('sealed');
  });
});

describe('formatReportList', () => {
  it('prints one line per report', () => {
    expect(formatReportList([completedReport(), failedReport()])).toBe(
      [
        '11111111  Completed           2026-06-01T10:00:00.000Z  123 Solar Ave',
        '11111111  Failed              2026-06-01T10:00:00.000Z  123 Solar Ave',
      ].join('\n'),
    );
  });

  it('hints at the run command when empty', () => {
    expect(formatReportList([])).toBe('No reports stored. Run "solarcalc run <location>" to create one.');
  });
});

describe('formatRoiResult', () => {
  it('marks the milestones past payback', () => {
    const report = RoiCalculator.compute(
      { valid: true, annualYieldKwh: 6120, peakPowerKw: 5, matchedBy: 'label' },
      { ...DEFAULT_ECONOMICS },
    );
    const lines = formatRoiResult(report, RoiCalculator.projectSavings(report, 10)).split('\n');

    expect(lines.slice(0, 4)).toEqual([
      'System size: 5.00 kWp (extracted)',
      'Annual savings: 918.00',
      'Estimated system cost: 6000.00',
      'Payback: 6.5 years',
    ]);
    expect(lines.slice(-3)).toEqual(['Cumulative savings:', '  year  5: 4590.00', '  year 10: 9180.00 (paid back)']);
  });
});
