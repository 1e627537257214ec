import { z } from 'zod/v4';

export const DEFAULT_ECONOMICS = {
  electricityPricePerKwh: 0.15,
  panelCostPerKw: 1200,
  expectedLifetimeYears: 20,
} as const;

/**
 * Economic assumptions for the ROI model. Supplied by configuration or CLI
 * flags; the pipeline only ever reads them. Positivity of cost and lifetime
 * is checked at computation time so that a bad value surfaces as a recorded
 * computation error rather than a config crash.
 */
export const EconomicAssumptionsSchema = z.object({
  electricityPricePerKwh: z.number().default(DEFAULT_ECONOMICS.electricityPricePerKwh),
  panelCostPerKw: z.number().default(DEFAULT_ECONOMICS.panelCostPerKw),
  expectedLifetimeYears: z.number().default(DEFAULT_ECONOMICS.expectedLifetimeYears),
});

export type EconomicAssumptions = z.infer<typeof EconomicAssumptionsSchema>;

export const ProfitabilityRating = z.enum(['excellent', 'good', 'fair', 'low']);
export type ProfitabilityRating = z.infer<typeof ProfitabilityRating>;

export const ComputationIssue = z.enum(['DivisionByZero']);
export type ComputationIssue = z.infer<typeof ComputationIssue>;

/**
 * Derived financial summary. `paybackYears` is `Infinity` when the system
 * never saves anything; see `RunReportDocumentSchema` for the JSON form.
 */
export interface ProfitabilityReport {
  readonly annualSavings: number;
  readonly estimatedSystemCost: number;
  readonly paybackYears: number;
  readonly lifetimeSavings: number;
  readonly co2AvoidedKg: number;
  readonly rating: ProfitabilityRating;
  readonly systemSizeKw: number;
  /** `extracted` when the page stated the peak power, `derived` when estimated from yield. */
  readonly systemSizeSource: 'extracted' | 'derived';
  readonly issues: readonly ComputationIssue[];
}

/** One point of the cumulative savings projection. */
export interface SavingsPoint {
  year: number;
  cumulativeSavings: number;
}
