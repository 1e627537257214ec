import { z } from 'zod/v4';
import { LocationSchema, type Location } from './location.js';
import { ExtractedMetricsSchema, type ExtractedMetrics } from './metrics.js';
import {
  EconomicAssumptionsSchema,
  ProfitabilityRating,
  ComputationIssue,
  type EconomicAssumptions,
  type ProfitabilityReport,
} from './economics.js';

// ---------------------------------------------------------------------------
// States and step outcomes
// ---------------------------------------------------------------------------

export const WorkflowStateName = z.enum([
  'Idle',
  'Navigating',
  'Submitting',
  'Extracting',
  'Computing',
  'Publishing',
  'Completed',
  'PartiallyCompleted',
  'Failed',
]);
export type WorkflowStateName = z.infer<typeof WorkflowStateName>;

export const TerminalState = z.enum(['Completed', 'PartiallyCompleted', 'Failed']);
export type TerminalState = z.infer<typeof TerminalState>;

export function isTerminalState(state: WorkflowStateName): state is TerminalState {
  return TerminalState.safeParse(state).success;
}

export const StepStatus = z.enum(['success', 'failure', 'degraded']);
export type StepStatus = z.infer<typeof StepStatus>;

export const StepErrorSchema = z.object({
  /** Error class name, e.g. "TransientGatewayError" or "ComputationError:InvalidInput". */
  kind: z.string().min(1),
  message: z.string(),
});
export type StepError = z.infer<typeof StepErrorSchema>;

/**
 * One entry of the run's step log. Spine steps are named
 * `navigate`, `submit`, `extract`, `compute`; sinks are `sink:<name>`.
 */
export const StepOutcomeSchema = z.object({
  stepName: z.string().min(1),
  status: StepStatus,
  attempts: z.number().int().min(0),
  error: StepErrorSchema.optional(),
  durationMs: z.number().min(0),
});
export type StepOutcome = z.infer<typeof StepOutcomeSchema>;

/** Why a run ended in `Failed`. */
export const RunCauseSchema = z.object({
  step: z.string().min(1),
  kind: z.string().min(1),
  message: z.string(),
  /** Machine-readable reason for lifecycle failures (`run_timeout`, `cancelled`). */
  reason: z.string().optional(),
});
export type RunCause = z.infer<typeof RunCauseSchema>;

// ---------------------------------------------------------------------------
// RunReport (in memory)
// ---------------------------------------------------------------------------

/**
 * The record of one workflow execution. Built by RunReportRecorder during a
 * run and frozen on seal; every other component sees it read-only.
 */
export interface RunReport {
  readonly runId: string;
  readonly location: Location;
  readonly assumptions: EconomicAssumptions;
  readonly state: WorkflowStateName;
  readonly sealed: boolean;
  readonly metrics: ExtractedMetrics | null;
  /** Null when computation did not produce a report (financials unavailable). */
  readonly profitability: ProfitabilityReport | null;
  readonly steps: readonly StepOutcome[];
  readonly cause: RunCause | null;
  readonly startedAt: string;
  readonly completedAt: string | null;
}

// ---------------------------------------------------------------------------
// RunReport document (JSON form)
// ---------------------------------------------------------------------------

const ProfitabilityDocumentSchema = z.object({
  annualSavings: z.number(),
  estimatedSystemCost: z.number(),
  /** Null stands for a system that never pays back. */
  paybackYears: z.number().nullable(),
  lifetimeSavings: z.number(),
  co2AvoidedKg: z.number(),
  rating: ProfitabilityRating,
  systemSizeKw: z.number(),
  systemSizeSource: z.enum(['extracted', 'derived']),
  issues: z.array(ComputationIssue),
});

export const RunReportDocumentSchema = z.object({
  runId: z.string().uuid(),
  location: LocationSchema,
  assumptions: EconomicAssumptionsSchema,
  state: WorkflowStateName,
  metrics: ExtractedMetricsSchema.nullable(),
  profitability: ProfitabilityDocumentSchema.nullable(),
  steps: z.array(StepOutcomeSchema),
  cause: RunCauseSchema.nullable(),
  startedAt: z.string().datetime(),
  completedAt: z.string().datetime().nullable(),
});

export type RunReportDocument = z.infer<typeof RunReportDocumentSchema>;

/** JSON-safe form of a report, used for storage and `--json` output. */
export function toRunReportDocument(report: RunReport): RunReportDocument {
  const p = report.profitability;
  return {
    runId: report.runId,
    location: { ...report.location },
    assumptions: { ...report.assumptions },
    state: report.state,
    metrics: report.metrics ? { ...report.metrics } : null,
    profitability: p
      ? {
          annualSavings: p.annualSavings,
          estimatedSystemCost: p.estimatedSystemCost,
          paybackYears: Number.isFinite(p.paybackYears) ? p.paybackYears : null,
          lifetimeSavings: p.lifetimeSavings,
          co2AvoidedKg: p.co2AvoidedKg,
          rating: p.rating,
          systemSizeKw: p.systemSizeKw,
          systemSizeSource: p.systemSizeSource,
          issues: [...p.issues],
        }
      : null,
    steps: report.steps.map((s) => ({ ...s })),
    cause: report.cause ? { ...report.cause } : null,
    startedAt: report.startedAt,
    completedAt: report.completedAt,
  };
}

export function fromRunReportDocument(doc: RunReportDocument): RunReport {
  const p = doc.profitability;
  return {
    ...doc,
    sealed: isTerminalState(doc.state),
    profitability: p ? { ...p, paybackYears: p.paybackYears ?? Infinity } : null,
  };
}
