import { z } from 'zod/v4';

/** Upper sanity bound for a residential annual yield, in kWh. */
export const ANNUAL_YIELD_CEILING_KWH = 100_000;

export const ExtractionFailureReason = z.enum(['no_numeric_match', 'out_of_range']);
export type ExtractionFailureReason = z.infer<typeof ExtractionFailureReason>;

export const ValidMetricsSchema = z.object({
  valid: z.literal(true),
  annualYieldKwh: z.number().min(0).max(ANNUAL_YIELD_CEILING_KWH),
  /** Installed peak power the estimate was run for, when the page states it. */
  peakPowerKw: z.number().positive().optional(),
  systemLossesPct: z.number().min(0).max(100).optional(),
  /** Yearly in-plane irradiation in kWh/m². */
  irradiationKwhM2: z.number().min(0).optional(),
  /** Which pattern produced the yield: a labelled value or the loose fallback. */
  matchedBy: z.enum(['label', 'loose']),
});

export const InvalidMetricsSchema = z.object({
  valid: z.literal(false),
  reason: ExtractionFailureReason,
});

export const ExtractedMetricsSchema = z.discriminatedUnion('valid', [
  ValidMetricsSchema,
  InvalidMetricsSchema,
]);

export type ValidMetrics = z.infer<typeof ValidMetricsSchema>;
export type InvalidMetrics = z.infer<typeof InvalidMetricsSchema>;
export type ExtractedMetrics = z.infer<typeof ExtractedMetricsSchema>;
