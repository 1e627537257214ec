import type { RunReport } from '@domain/types/run-report.js';
import { describeLocation } from '@domain/types/location.js';

/** Character budget of a social post. */
export const SOCIAL_POST_LIMIT = 280;

function formatPayback(years: number): string {
  return Number.isFinite(years) ? `${years.toFixed(1)} years` : 'never';
}

/**
 * Plain-text summary of a run: location, yield, financials, CO2 and rating.
 * Used by the CLI and the report-delivery sink.
 */
export function formatTextReport(report: RunReport): string {
  const lines = [
    `Solar profitability report: ${describeLocation(report.location)}`,
    `Run: ${report.runId} (${report.state})`,
  ];

  const { metrics, profitability: p } = report;
  if (metrics === null) {
    lines.push('Annual yield: unavailable');
  } else if (!metrics.valid) {
    lines.push(`Annual yield: unavailable (${metrics.reason})`);
  } else {
    lines.push(`Annual yield: ${metrics.annualYieldKwh.toFixed(0)} kWh`);
    if (metrics.irradiationKwhM2 !== undefined) {
      lines.push(`Irradiation: ${metrics.irradiationKwhM2.toFixed(0)} kWh/m² per year`);
    }
  }

  if (p) {
    lines.push(
      `System size: ${p.systemSizeKw.toFixed(2)} kWp (${p.systemSizeSource})`,
      `Annual savings: ${p.annualSavings.toFixed(2)}`,
      `Estimated system cost: ${p.estimatedSystemCost.toFixed(2)}`,
      `Payback: ${formatPayback(p.paybackYears)}`,
      `Lifetime savings (${report.assumptions.expectedLifetimeYears} years): ${p.lifetimeSavings.toFixed(2)}`,
      `CO2 avoided: ${p.co2AvoidedKg.toFixed(0)} kg per year`,
      `Rating: ${p.rating}`,
    );
  } else {
    lines.push('Financials: unavailable');
  }

  if (report.cause) {
    lines.push(`Failed at ${report.cause.step}: ${report.cause.message}`);
  }
  return lines.join('\n');
}

/**
 * Short shareable summary, at most SOCIAL_POST_LIMIT characters. A long
 * location is shortened with an ellipsis; the figures are always kept.
 */
export function composeSocialPost(report: RunReport): string {
  const place = describeLocation(report.location);
  const p = report.profitability;
  const metrics = report.metrics;

  const body = (where: string): string => {
    if (!p || !metrics?.valid) {
      return `Solar check for ${where}: financials unavailable for this run. #solar`;
    }
    return (
      `Solar check for ${where}: ${metrics.annualYieldKwh.toFixed(0)} kWh/year, ` +
      `saves ${p.annualSavings.toFixed(0)}/year, payback ${formatPayback(p.paybackYears)}, ` +
      `${p.co2AvoidedKg.toFixed(0)} kg CO2 avoided yearly. Rating: ${p.rating}. #solar #renewables`
    );
  };

  const full = body(place);
  if (full.length <= SOCIAL_POST_LIMIT) return full;

  const keep = Math.max(0, place.length - (full.length - SOCIAL_POST_LIMIT) - 1);
  return body(`${place.slice(0, keep)}…`);
}
