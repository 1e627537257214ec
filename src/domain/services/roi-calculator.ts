import type { ExtractedMetrics } from '@domain/types/metrics.js';
import type {
  ComputationIssue,
  EconomicAssumptions,
  ProfitabilityRating,
  ProfitabilityReport,
  SavingsPoint,
} from '@domain/types/economics.js';
import { ComputationError } from '@shared/lib/errors.js';

/** Typical yearly output of one installed kWp, used when the page omits peak power. */
export const DEFAULT_SPECIFIC_YIELD_KWH_PER_KWP = 1200;

/** Grid emission factor, kg CO2 per kWh displaced. */
export const CO2_KG_PER_KWH = 0.4;

/** Projection horizon of the savings chart, in years. */
export const PROJECTION_YEARS = 25;

export interface ComputeOptions {
  specificYieldKwhPerKwp?: number;
}

export function rateYield(annualYieldKwh: number): ProfitabilityRating {
  if (annualYieldKwh > 5000) return 'excellent';
  if (annualYieldKwh > 4000) return 'good';
  if (annualYieldKwh > 3000) return 'fair';
  return 'low';
}

function assertAssumptions(a: EconomicAssumptions): void {
  if (!Number.isFinite(a.panelCostPerKw) || a.panelCostPerKw <= 0) {
    throw new ComputationError('InvalidInput', `panelCostPerKw must be positive (got ${a.panelCostPerKw})`);
  }
  if (!Number.isFinite(a.expectedLifetimeYears) || a.expectedLifetimeYears <= 0) {
    throw new ComputationError(
      'InvalidInput',
      `expectedLifetimeYears must be positive (got ${a.expectedLifetimeYears})`,
    );
  }
  if (!Number.isFinite(a.electricityPricePerKwh) || a.electricityPricePerKwh < 0) {
    throw new ComputationError(
      'InvalidInput',
      `electricityPricePerKwh must be zero or more (got ${a.electricityPricePerKwh})`,
    );
  }
}

/**
 * Maps extracted yield and economic assumptions to a
 * profitability summary.
 *
 *   annualSavings       = annualYieldKwh × electricityPricePerKwh
 *   estimatedSystemCost = (peakPowerKw, or yield ÷ specific yield) × panelCostPerKw
 *   paybackYears        = estimatedSystemCost ÷ annualSavings
 *   lifetimeSavings     = annualSavings × expectedLifetimeYears − estimatedSystemCost
 *
 * Pure and deterministic. Zero savings is reported on the result
 * (`paybackYears = Infinity`, issue `DivisionByZero`), not thrown.
 */
export const RoiCalculator = {
  /**
   * @throws ComputationError (`InvalidInput`) for invalid metrics or non-positive
   *   panel cost / lifetime
   */
  compute(
    metrics: ExtractedMetrics,
    assumptions: EconomicAssumptions,
    options: ComputeOptions = {},
  ): ProfitabilityReport {
    if (!metrics.valid) {
      throw new ComputationError('InvalidInput', `No valid annual yield to compute from (${metrics.reason})`);
    }
    assertAssumptions(assumptions);

    const specificYield = options.specificYieldKwhPerKwp ?? DEFAULT_SPECIFIC_YIELD_KWH_PER_KWP;
    if (metrics.peakPowerKw === undefined && !(specificYield > 0)) {
      throw new ComputationError('InvalidInput', `specificYieldKwhPerKwp must be positive (got ${specificYield})`);
    }

    const { annualYieldKwh } = metrics;
    const systemSizeKw = metrics.peakPowerKw ?? annualYieldKwh / specificYield;
    const annualSavings = annualYieldKwh * assumptions.electricityPricePerKwh;
    const estimatedSystemCost = systemSizeKw * assumptions.panelCostPerKw;

    const issues: ComputationIssue[] = [];
    let paybackYears: number;
    if (annualSavings === 0) {
      paybackYears = Infinity;
      issues.push('DivisionByZero');
    } else {
      paybackYears = estimatedSystemCost / annualSavings;
    }

    const report: ProfitabilityReport = {
      annualSavings,
      estimatedSystemCost,
      paybackYears,
      lifetimeSavings: annualSavings * assumptions.expectedLifetimeYears - estimatedSystemCost,
      co2AvoidedKg: annualYieldKwh * CO2_KG_PER_KWH,
      rating: rateYield(annualYieldKwh),
      systemSizeKw,
      systemSizeSource: metrics.peakPowerKw === undefined ? 'derived' : 'extracted',
      issues: Object.freeze(issues),
    };
    return Object.freeze(report);
  },

  /** Cumulative savings for years 1..`years`, the dashboard's break-even chart. */
  projectSavings(report: ProfitabilityReport, years: number = PROJECTION_YEARS): SavingsPoint[] {
    return Array.from({ length: Math.max(0, Math.floor(years)) }, (_, i) => ({
      year: i + 1,
      cumulativeSavings: report.annualSavings * (i + 1),
    }));
  },
};
