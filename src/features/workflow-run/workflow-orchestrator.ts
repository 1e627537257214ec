import { randomUUID } from 'node:crypto';
import { setTimeout as delay } from 'node:timers/promises';
import type { BrowserSession, IActionGateway } from '@domain/ports/action-gateway.js';
import type { ISink } from '@domain/ports/sink.js';
import type { ActionRequest, ActionResult } from '@domain/types/action.js';
import type { FlowConfig, WorkflowConfig } from '@domain/types/config.js';
import type { EconomicAssumptions, ProfitabilityReport } from '@domain/types/economics.js';
import type { Location } from '@domain/types/location.js';
import type { ExtractedMetrics, InvalidMetrics } from '@domain/types/metrics.js';
import type {
  RunCause,
  RunReport,
  StepOutcome,
  WorkflowStateName,
} from '@domain/types/run-report.js';
import { sinkStepName } from '@domain/types/sink.js';
import { parseLocation, validateLocation } from '@domain/types/location.js';
import { classifyActionResult } from '@domain/services/action-classifier.js';
import { FieldExtractor } from '@domain/services/field-extractor.js';
import { RoiCalculator } from '@domain/services/roi-calculator.js';
import {
  ComputationError,
  ExtractionError,
  InvalidActionError,
  RunCancelledError,
  RunTimeoutError,
  SolarCalcError,
} from '@shared/lib/errors.js';
import { logger as defaultLogger, errorFields, type Logger } from '@shared/lib/logger.js';
import { SinkDispatcher } from '@features/publish/sink-dispatcher.js';
import { buildFlowPlan, type FlowPlan } from './flow-plan.js';
import { RetryPolicy } from './retry-policy.js';
import { RunReportRecorder } from './run-report-recorder.js';
import { SessionLock, type SessionLease } from './session-lock.js';
import {
  INITIAL_STATE,
  stepNameFor,
  transition,
  type WorkflowEvent,
  type WorkflowState,
} from './workflow-state.js';

/**
 * Dependencies injected into the orchestrator for testability.
 */
export interface WorkflowOrchestratorDeps {
  gateway: IActionGateway;
  /** Enabled sinks, in publishing order. */
  sinks?: readonly ISink[];
  /** Share one lock between orchestrators that drive the same remote session. */
  sessionLock?: SessionLock;
  extractor?: { extract(rawContent: string): ExtractedMetrics };
  calculator?: typeof RoiCalculator;
  dispatcher?: SinkDispatcher;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => Date;
  generateRunId?: () => string;
  logger?: Logger;
  /** Optional lifecycle hooks. Errors are swallowed and logged as warnings */
  hooks?: {
    onStateChange?: (from: WorkflowStateName, to: WorkflowStateName, runId: string) => Promise<void> | void;
    onStepComplete?: (outcome: StepOutcome, runId: string) => Promise<void> | void;
  };
}

export interface WorkflowSettings {
  assumptions: EconomicAssumptions;
  flow: FlowConfig;
  workflow: WorkflowConfig;
  actionTimeoutMs: number;
  specificYieldKwhPerKwp?: number;
}

export interface RunOptions {
  /** Per-run overrides of the configured economics. */
  assumptions?: Partial<EconomicAssumptions>;
  /** Cooperative cancellation, honoured at step boundaries. */
  signal?: AbortSignal;
}

interface RunContext {
  runId: string;
  state: WorkflowState;
  recorder: RunReportRecorder;
  assumptions: EconomicAssumptions;
  session: BrowserSession | null;
  /** Set once the deadline has fired; the abandoned drive must not record anything after. */
  halted: boolean;
  report: RunReport | null;
  log: Logger;
}

type Verdict<T> = { kind: 'done'; value: T } | { kind: 'miss'; error: SolarCalcError };

type StepRun<T> =
  | { ok: true; value: T; attempts: number; durationMs: number }
  | { ok: false; error: Error; attempts: number; durationMs: number };

/**
 * Drives one estimator run end to end.
 *
 *   Idle → Navigating → Submitting → Extracting → Computing → Publishing
 *        → Completed | PartiallyCompleted | Failed
 *
 * Navigate, submit and extract are retried with bounded exponential backoff
 * and fall back to alternative targets from the flow plan. Computation and
 * publishing run once. Every run ends with a sealed RunReport, and the
 * browser session is closed and released on every exit path.
 */
export class WorkflowOrchestrator {
  private readonly lock: SessionLock;
  private readonly policy: RetryPolicy;
  private readonly extractor: { extract(rawContent: string): ExtractedMetrics };
  private readonly calculator: typeof RoiCalculator;
  private readonly dispatcher: SinkDispatcher;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly clock: () => Date;
  private readonly generateRunId: () => string;
  private readonly logger: Logger;

  constructor(
    private readonly deps: WorkflowOrchestratorDeps,
    private readonly settings: WorkflowSettings,
  ) {
    this.lock = deps.sessionLock ?? new SessionLock();
    this.policy = new RetryPolicy(settings.workflow);
    this.extractor = deps.extractor ?? FieldExtractor;
    this.calculator = deps.calculator ?? RoiCalculator;
    this.logger = deps.logger ?? defaultLogger;
    this.dispatcher = deps.dispatcher ?? new SinkDispatcher({ logger: this.logger });
    this.sleep = deps.sleep ?? ((ms) => delay(ms));
    this.clock = deps.clock ?? (() => new Date());
    this.generateRunId = deps.generateRunId ?? randomUUID;
  }

  /** The run currently holding the browser session, if any. */
  get activeRunId(): string | null {
    return this.lock.activeRunId;
  }

  /**
   * Run the workflow for one location.
   *
   * @throws ValidationError when the location is neither an address nor valid coordinates
   * @throws RunInProgressError when another run holds the session and the busy policy is `reject`
   */
  async run(input: Location | string, options: RunOptions = {}): Promise<RunReport> {
    const location = validateLocation(typeof input === 'string' ? parseLocation(input) : input);
    const runId = this.generateRunId();
    const lease = await this.acquire(runId);

    const assumptions: EconomicAssumptions = { ...this.settings.assumptions, ...options.assumptions };
    const log = this.logger.child({ runId });
    const ctx: RunContext = {
      runId,
      state: INITIAL_STATE,
      recorder: new RunReportRecorder(runId, location, assumptions, this.clock),
      assumptions,
      session: null,
      halted: false,
      report: null,
      log,
    };

    log.info('Run started', { location: input, timeoutMs: this.settings.workflow.runTimeoutMs });

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.settings.workflow.runTimeoutMs);
    });

    let abandoned = false;
    try {
      const drive = this.drive(ctx, buildFlowPlan(location, this.settings.flow), options.signal);
      const winner = await Promise.race([drive.then(() => 'done' as const), deadline]);

      if (winner === 'timeout') {
        abandoned = true;
        ctx.halted = true;
        const activeStep = stepNameFor(ctx.state.name);
        log.warn('Run deadline reached', { activeStep, completedSteps: ctx.recorder.completedSteps() });
        const notified = this.seal(ctx, activeStep, new RunTimeoutError(this.settings.workflow.runTimeoutMs, activeStep));
        this.closeWhenSettled(ctx, Promise.allSettled([drive, notified]));
      }
    } finally {
      clearTimeout(timer);
      if (!abandoned) await this.closeSession(ctx);
      lease.release();
    }

    const report =
      ctx.report ??
      (await this.failRun(ctx, 'run', new SolarCalcError('Run ended without reaching a terminal state')));
    log.info('Run finished', { state: report.state, steps: report.steps.length });
    return report;
  }

  /**
   * Close the session of a run abandoned at its deadline once its last step
   * and hooks settle. The lock is already released by then; a step that never
   * settles keeps only its own session open.
   */
  private closeWhenSettled(ctx: RunContext, pending: Promise<unknown>): void {
    void pending
      .then(() => this.closeSession(ctx))
      .then(() => ctx.log.debug('Abandoned run settled'));
  }

  private async acquire(runId: string): Promise<SessionLease> {
    if (this.settings.workflow.onBusy === 'queue') {
      if (this.lock.activeRunId !== null) {
        this.logger.info('Session busy, run queued', { runId, activeRunId: this.lock.activeRunId });
      }
      return this.lock.acquireQueued(runId);
    }
    return this.lock.acquire(runId);
  }

  // ---------------------------------------------------------------------------
  // Drive
  // ---------------------------------------------------------------------------

  private async drive(ctx: RunContext, plan: FlowPlan, signal: AbortSignal | undefined): Promise<void> {
    try {
      this.checkCancelled(signal, 'session');
      ctx.session = await this.deps.gateway.openSession();
      if (ctx.halted) return;
      ctx.log.debug('Browser session opened', { sessionId: ctx.session.id, gateway: this.deps.gateway.name });
      await this.apply(ctx, { type: 'START' });

      // Navigate
      const navigated = await this.runSpineStep<null>(ctx, 'navigate', plan.navigate, () => ({ kind: 'done', value: null }));
      if (ctx.halted) return;
      if (!navigated.ok) return this.failSpineStep(ctx, 'navigate', navigated);
      await this.recordStep(ctx, { stepName: 'navigate', status: 'success', attempts: navigated.attempts, durationMs: navigated.durationMs });
      this.checkCancelled(signal, 'submit');
      await this.apply(ctx, { type: 'PAGE_LOADED' });

      // Submit
      const submitted = await this.runSpineStep<null>(ctx, 'submit', plan.submit, () => ({ kind: 'done', value: null }));
      if (ctx.halted) return;
      if (!submitted.ok) return this.failSpineStep(ctx, 'submit', submitted);
      await this.recordStep(ctx, { stepName: 'submit', status: 'success', attempts: submitted.attempts, durationMs: submitted.durationMs });
      this.checkCancelled(signal, 'extract');
      await this.apply(ctx, { type: 'FORM_SUBMITTED' });

      // Extract
      const metrics = await this.extract(ctx, plan);
      if (ctx.halted || metrics === null) return;
      this.checkCancelled(signal, 'compute');
      await this.apply(ctx, { type: 'METRICS_EXTRACTED', metrics });

      // Compute
      const profitability = await this.compute(ctx, metrics);
      if (ctx.halted) return;
      this.checkCancelled(signal, 'publish');
      await this.apply(ctx, { type: 'COMPUTED', profitability });

      // Publish
      const failedSinks = await this.publish(ctx);
      if (ctx.halted) return;
      await this.apply(ctx, { type: 'PUBLISHED', failedSinks });
    } catch (err) {
      if (ctx.halted) {
        ctx.log.debug('Abandoned run step settled with an error', errorFields(err));
        return;
      }
      if (err instanceof RunCancelledError) {
        ctx.log.info('Run cancelled', { beforeStep: err.beforeStep, completedSteps: ctx.recorder.completedSteps() });
      }
      const step = err instanceof RunCancelledError ? err.beforeStep : stepNameFor(ctx.state.name);
      await this.failRun(ctx, step, err);
    }
  }

  /**
   * Attempt one spine step across its planned targets.
   *
   * A transient failure retries the same target after backoff. A rejected
   * action, or a result `interpret` does not accept, moves on to the next
   * target when there is one. Every attempt counts toward the retry bound.
   */
  private async runSpineStep<T>(
    ctx: RunContext,
    stepName: string,
    requests: readonly ActionRequest[],
    interpret: (result: ActionResult) => Verdict<T>,
  ): Promise<StepRun<T>> {
    const session = ctx.session;
    const startedAt = Date.now();
    const elapsed = () => Math.max(0, Date.now() - startedAt);
    if (!session) {
      return { ok: false, error: new InvalidActionError('No open browser session'), attempts: 0, durationMs: 0 };
    }

    let attempts = 0;
    let targetIndex = 0;
    let lastError: Error = new InvalidActionError(`No ${stepName} action planned`);
    const hasFallback = () => targetIndex < requests.length - 1;

    while (this.policy.canRetry(attempts) && !ctx.halted) {
      const request = requests[targetIndex];
      if (!request) break;

      if (attempts > 0) {
        await this.sleep(this.policy.backoffMs(attempts));
        if (ctx.halted) break;
      }

      attempts++;
      const result = await session.perform(request, this.settings.actionTimeoutMs);

      if (result.status === 'success') {
        const verdict = interpret(result);
        if (verdict.kind === 'done') {
          return { ok: true, value: verdict.value, attempts, durationMs: elapsed() };
        }
        lastError = verdict.error;
        ctx.log.debug('Step result not usable', { step: stepName, attempt: attempts, error: verdict.error.message });
        if (hasFallback()) targetIndex++;
        continue;
      }

      const error = classifyActionResult(request, result);
      lastError = error;
      ctx.log.debug('Step attempt failed', {
        step: stepName,
        attempt: attempts,
        target: request.target,
        retryable: error.retryable,
        error: error.message,
      });
      if (!error.retryable) {
        if (!hasFallback()) break;
        targetIndex++;
      }
    }

    return { ok: false, error: lastError, attempts, durationMs: elapsed() };
  }

  private async extract(ctx: RunContext, plan: FlowPlan): Promise<ExtractedMetrics | null> {
    const outcome = await this.runSpineStep(ctx, 'extract', plan.extract, (result): Verdict<ExtractedMetrics> => {
      const metrics = this.extractor.extract(result.payload ?? '');
      return metrics.valid
        ? { kind: 'done', value: metrics }
        : { kind: 'miss', error: new ExtractionError(metrics.reason) };
    });
    if (ctx.halted) return null;

    if (outcome.ok) {
      ctx.recorder.setMetrics(outcome.value);
      await this.recordStep(ctx, { stepName: 'extract', status: 'success', attempts: outcome.attempts, durationMs: outcome.durationMs });
      return outcome.value;
    }

    if (outcome.error instanceof ExtractionError) {
      // Page loaded but held no usable yield: carry on without financials.
      const metrics: InvalidMetrics = { valid: false, reason: outcome.error.reason };
      ctx.recorder.setMetrics(metrics);
      await this.recordStep(ctx, {
        stepName: 'extract',
        status: 'degraded',
        attempts: outcome.attempts,
        error: { kind: 'ExtractionError', message: outcome.error.message },
        durationMs: outcome.durationMs,
      });
      ctx.log.warn('Extraction degraded', { reason: outcome.error.reason });
      return metrics;
    }

    await this.failSpineStep(ctx, 'extract', outcome);
    return null;
  }

  private async compute(ctx: RunContext, metrics: ExtractedMetrics): Promise<ProfitabilityReport | null> {
    const startedAt = Date.now();
    try {
      const profitability = this.calculator.compute(metrics, ctx.assumptions, {
        specificYieldKwhPerKwp: this.settings.specificYieldKwhPerKwp,
      });
      ctx.recorder.setProfitability(profitability);
      const divisionByZero = profitability.issues.includes('DivisionByZero');
      await this.recordStep(ctx, {
        stepName: 'compute',
        status: divisionByZero ? 'degraded' : 'success',
        attempts: 1,
        ...(divisionByZero
          ? { error: { kind: 'ComputationError:DivisionByZero', message: 'Annual savings are zero; payback never occurs' } }
          : {}),
        durationMs: Math.max(0, Date.now() - startedAt),
      });
      return profitability;
    } catch (err) {
      if (!(err instanceof ComputationError)) throw err;
      ctx.recorder.setProfitability(null);
      await this.recordStep(ctx, {
        stepName: 'compute',
        status: 'failure',
        attempts: 1,
        error: { kind: `ComputationError:${err.kind}`, message: err.message },
        durationMs: Math.max(0, Date.now() - startedAt),
      });
      ctx.log.warn('Computation failed, financials unavailable', { kind: err.kind, error: err.message });
      return null;
    }
  }

  private async publish(ctx: RunContext): Promise<string[]> {
    const sinks = this.deps.sinks ?? [];
    if (sinks.length === 0) return [];

    const outcomes = await this.dispatcher.publishAll(sinks, ctx.recorder.snapshot());
    if (ctx.halted) return [];

    const failed: string[] = [];
    for (const outcome of outcomes) {
      if (outcome.error) failed.push(outcome.sinkName);
      await this.recordStep(ctx, {
        stepName: sinkStepName(outcome.sinkName),
        status: outcome.error ? 'failure' : 'success',
        attempts: 1,
        ...(outcome.error ? { error: { kind: outcome.error.name, message: outcome.error.message } } : {}),
        durationMs: outcome.durationMs,
      });
    }
    return failed;
  }

  // ---------------------------------------------------------------------------
  // State bookkeeping
  // ---------------------------------------------------------------------------

  /**
   * Advance the state machine. The report is sealed before this returns its
   * promise, which settles once the state-change hook has run.
   */
  private apply(ctx: RunContext, event: WorkflowEvent): Promise<void> {
    const from = ctx.state.name;
    const next = transition(ctx.state, event);
    ctx.state = next;

    if (next.name === 'Completed' || next.name === 'PartiallyCompleted') {
      ctx.report = ctx.recorder.seal(next.name);
    } else if (next.name === 'Failed') {
      ctx.report = ctx.recorder.seal('Failed', next.cause);
    } else {
      ctx.recorder.enter(next.name);
    }

    ctx.log.debug('State changed', { from, to: next.name });
    return this.fireHook('onStateChange', () => this.deps.hooks?.onStateChange?.(from, next.name, ctx.runId));
  }

  private async recordStep(ctx: RunContext, outcome: StepOutcome): Promise<void> {
    ctx.recorder.recordStep(outcome);
    await this.fireHook('onStepComplete', () => this.deps.hooks?.onStepComplete?.(outcome, ctx.runId));
  }

  private async failSpineStep(ctx: RunContext, stepName: string, outcome: StepRun<unknown>): Promise<void> {
    if (outcome.ok) return;
    await this.recordStep(ctx, {
      stepName,
      status: 'failure',
      attempts: outcome.attempts,
      error: { kind: outcome.error.name, message: outcome.error.message },
      durationMs: outcome.durationMs,
    });
    await this.failRun(ctx, stepName, outcome.error);
  }

  private async failRun(ctx: RunContext, step: string, err: unknown): Promise<RunReport> {
    await this.seal(ctx, step, err);
    return ctx.recorder.seal('Failed');
  }

  /** Seal the run as failed at once; the returned promise tracks the hook. */
  private seal(ctx: RunContext, step: string, err: unknown): Promise<void> {
    if (ctx.report) return Promise.resolve();

    const cause: RunCause = {
      step,
      kind: err instanceof Error ? err.name : 'Error',
      message: err instanceof Error ? err.message : String(err),
      ...(err instanceof RunTimeoutError || err instanceof RunCancelledError ? { reason: err.reason } : {}),
    };
    ctx.log.error('Run failed', { step, ...errorFields(err) });
    return this.apply(ctx, { type: 'FAIL', cause });
  }

  private checkCancelled(signal: AbortSignal | undefined, beforeStep: string): void {
    if (signal?.aborted) throw new RunCancelledError(beforeStep);
  }

  private async closeSession(ctx: RunContext): Promise<void> {
    if (!ctx.session) return;
    try {
      await ctx.session.close();
    } catch (err) {
      ctx.log.warn('Failed to close browser session', errorFields(err));
    }
  }

  /**
   * Fire a lifecycle hook, swallowing and logging any errors.
   */
  private async fireHook(hookName: string, fn: () => Promise<void> | void): Promise<void> {
    try {
      await fn();
    } catch (err) {
      this.logger.warn('Lifecycle hook error (swallowed)', {
        hook: hookName,
        ...errorFields(err),
      });
    }
  }
}
