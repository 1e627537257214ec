import type { ProfitabilityReport, SavingsPoint } from '@domain/types/economics.js';
import type { RunReport, StepOutcome } from '@domain/types/run-report.js';
import { toRunReportDocument } from '@domain/types/run-report.js';
import { describeLocation } from '@domain/types/location.js';
import { formatTextReport } from '@domain/services/report-text.js';

function formatStep(step: StepOutcome): string {
  const icon = step.status === 'success' ? '+' : step.status === 'degraded' ? '~' : 'x';
  const tries = step.attempts === 1 ? '1 attempt' : `${step.attempts} attempts`;
  const line = `  ${icon} ${step.stepName} (${step.status}, ${tries}, ${Math.round(step.durationMs)}ms)`;
  return step.error ? `${line}\n      ${step.error.kind}: ${step.error.message}` : line;
}

/**
 * Format a sealed run report for human-readable display: the text report
 * followed by the step log.
 */
export function formatRunReport(report: RunReport): string {
  const lines = [formatTextReport(report), '', 'Steps:'];
  if (report.steps.length === 0) {
    lines.push('  (none)');
  } else {
    lines.push(...report.steps.map(formatStep));
  }
  return lines.join('\n');
}

export function formatRunReportJson(report: RunReport): string {
  return JSON.stringify(toRunReportDocument(report), null, 2);
}

export function formatRunReportsJson(reports: readonly RunReport[]): string {
  return JSON.stringify(reports.map(toRunReportDocument), null, 2);
}

/**
 * One line per stored report: short id, state, start time, location.
 */
export function formatReportList(reports: readonly RunReport[]): string {
  if (reports.length === 0) {
    return 'No reports stored. Run "solarcalc run <location>" to create one.';
  }
  return reports
    .map((r) => `${r.runId.slice(0, 8)}  ${r.state.padEnd(18)}  ${r.startedAt}  ${describeLocation(r.location)}`)
    .join('\n');
}

/** Standalone ROI output, with the cumulative savings every five years. */
export function formatRoiResult(report: ProfitabilityReport, projection: readonly SavingsPoint[]): string {
  const payback = Number.isFinite(report.paybackYears) ? `${report.paybackYears.toFixed(1)} years` : 'never';
  const lines = [
    `System size: ${report.systemSizeKw.toFixed(2)} kWp (${report.systemSizeSource})`,
    `Annual savings: ${report.annualSavings.toFixed(2)}`,
    `Estimated system cost: ${report.estimatedSystemCost.toFixed(2)}`,
    `Payback: ${payback}`,
    `Lifetime savings: ${report.lifetimeSavings.toFixed(2)}`,
    `CO2 avoided: ${report.co2AvoidedKg.toFixed(0)} kg per year`,
    `Rating: ${report.rating}`,
  ];
  const milestones = projection.filter((p) => p.year % 5 === 0);
  if (milestones.length > 0) {
    lines.push('', 'Cumulative savings:');
    for (const point of milestones) {
      const marker = point.cumulativeSavings >= report.estimatedSystemCost ? ' (paid back)' : '';
      lines.push(`  year ${String(point.year).padStart(2)}: ${point.cumulativeSavings.toFixed(2)}${marker}`);
    }
  }
  return lines.join('\n');
}
