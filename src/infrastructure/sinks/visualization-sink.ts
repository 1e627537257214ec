import { join } from 'node:path';
import { z } from 'zod/v4';
import type { ISink } from '@domain/ports/sink.js';
import type { IPersistence } from '@domain/ports/persistence.js';
import type { RunReport } from '@domain/types/run-report.js';
import type { SinkName, SinkResult } from '@domain/types/sink.js';
import { ProfitabilityRating } from '@domain/types/economics.js';
import { describeLocation } from '@domain/types/location.js';
import { PROJECTION_YEARS, RoiCalculator } from '@domain/services/roi-calculator.js';
import { JsonStore } from '@infra/persistence/json-store.js';

export const DashboardDocumentSchema = z.object({
  runId: z.string().min(1),
  location: z.string(),
  state: z.string(),
  metrics: z.object({
    annualYieldKwh: z.number().nullable(),
    irradiationKwhM2: z.number().nullable(),
    peakPowerKw: z.number().nullable(),
  }),
  /** Null when the run produced no financials. */
  financials: z
    .object({
      annualSavings: z.number(),
      estimatedSystemCost: z.number(),
      paybackYears: z.number().nullable(),
      lifetimeSavings: z.number(),
      co2AvoidedKg: z.number(),
      rating: ProfitabilityRating,
      systemSizeKw: z.number(),
    })
    .nullable(),
  /** Cumulative savings per year, plotted against the flat system-cost line. */
  savingsSeries: z.array(z.object({ year: z.number().int().min(1), cumulativeSavings: z.number() })),
  systemCostLine: z.number().nullable(),
});

export type DashboardDocument = z.infer<typeof DashboardDocumentSchema>;

export function buildDashboard(report: RunReport, years: number = PROJECTION_YEARS): DashboardDocument {
  const m = report.metrics?.valid ? report.metrics : null;
  const p = report.profitability;
  return {
    runId: report.runId,
    location: describeLocation(report.location),
    state: report.state,
    metrics: {
      annualYieldKwh: m?.annualYieldKwh ?? null,
      irradiationKwhM2: m?.irradiationKwhM2 ?? null,
      peakPowerKw: m?.peakPowerKw ?? null,
    },
    financials: p
      ? {
          annualSavings: p.annualSavings,
          estimatedSystemCost: p.estimatedSystemCost,
          paybackYears: Number.isFinite(p.paybackYears) ? p.paybackYears : null,
          lifetimeSavings: p.lifetimeSavings,
          co2AvoidedKg: p.co2AvoidedKg,
          rating: p.rating,
          systemSizeKw: p.systemSizeKw,
        }
      : null,
    savingsSeries: p ? RoiCalculator.projectSavings(p, years) : [],
    systemCostLine: p ? p.estimatedSystemCost : null,
  };
}

/** Writes a chart-ready dashboard document to `.solarcalc/dashboards/<runId>.json`. */
export class VisualizationSink implements ISink {
  readonly name: SinkName = 'visualization';

  constructor(
    private readonly dashboardsDir: string,
    private readonly persistence: IPersistence = JsonStore,
  ) {}

  async publish(report: RunReport): Promise<SinkResult> {
    const path = join(this.dashboardsDir, `${report.runId}.json`);
    this.persistence.write(path, buildDashboard(report), DashboardDocumentSchema);
    return { status: 'success', detail: path };
  }
}
