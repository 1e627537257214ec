import type { Location } from '@domain/types/location.js';
import type { EconomicAssumptions, ProfitabilityReport } from '@domain/types/economics.js';
import type { ExtractedMetrics } from '@domain/types/metrics.js';
import type {
  RunCause,
  RunReport,
  StepOutcome,
  TerminalState,
  WorkflowStateName,
} from '@domain/types/run-report.js';
import { SealedReportError } from '@shared/lib/errors.js';

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Append-only builder for a RunReport.
 *
 * Owned by the orchestrator for the length of one run: state changes, step
 * outcomes, metrics and financials are recorded at every step boundary, and
 * `seal()` produces the final frozen report. Nothing can be recorded after
 * sealing.
 */
export class RunReportRecorder {
  private state: WorkflowStateName = 'Idle';
  private metrics: ExtractedMetrics | null = null;
  private profitability: ProfitabilityReport | null = null;
  private readonly steps: StepOutcome[] = [];
  private sealedReport: RunReport | null = null;
  private readonly startedAt: string;

  constructor(
    readonly runId: string,
    private readonly location: Location,
    private readonly assumptions: EconomicAssumptions,
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.startedAt = this.clock().toISOString();
  }

  enter(state: WorkflowStateName): void {
    this.assertOpen();
    this.state = state;
  }

  recordStep(outcome: StepOutcome): void {
    this.assertOpen();
    this.steps.push({ ...outcome });
  }

  setMetrics(metrics: ExtractedMetrics): void {
    this.assertOpen();
    this.metrics = metrics;
  }

  setProfitability(profitability: ProfitabilityReport | null): void {
    this.assertOpen();
    this.profitability = profitability;
  }

  /** Names of the steps that finished without a failure, in order. */
  completedSteps(): string[] {
    return this.steps.filter((s) => s.status !== 'failure').map((s) => s.stepName);
  }

  /** Frozen copy of the report as it stands, for sinks and hooks. */
  snapshot(): RunReport {
    return deepFreeze(this.build(false, null, null));
  }

  /**
   * Finish the report in a terminal state. Returns the sealed report; calling
   * again returns the same object.
   */
  seal(terminal: TerminalState, cause: RunCause | null = null): RunReport {
    if (this.sealedReport) return this.sealedReport;
    this.state = terminal;
    this.sealedReport = deepFreeze(this.build(true, cause, this.clock().toISOString()));
    return this.sealedReport;
  }

  private build(sealed: boolean, cause: RunCause | null, completedAt: string | null): RunReport {
    return {
      runId: this.runId,
      location: { ...this.location },
      assumptions: { ...this.assumptions },
      state: this.state,
      sealed,
      metrics: this.metrics ? { ...this.metrics } : null,
      profitability: this.profitability
        ? { ...this.profitability, issues: [...this.profitability.issues] }
        : null,
      steps: this.steps.map((s) => (s.error ? { ...s, error: { ...s.error } } : { ...s })),
      cause: cause ? { ...cause } : null,
      startedAt: this.startedAt,
      completedAt,
    };
  }

  private assertOpen(): void {
    if (this.sealedReport) throw new SealedReportError(this.runId);
  }
}
