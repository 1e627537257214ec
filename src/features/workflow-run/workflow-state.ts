import type { ExtractedMetrics } from '@domain/types/metrics.js';
import type { ProfitabilityReport } from '@domain/types/economics.js';
import type { RunCause, WorkflowStateName } from '@domain/types/run-report.js';
import { InvalidTransitionError } from '@shared/lib/errors.js';

// ---------------------------------------------------------------------------
// States
// ---------------------------------------------------------------------------

export type WorkflowState =
  | { name: 'Idle' }
  | { name: 'Navigating' }
  | { name: 'Submitting' }
  | { name: 'Extracting' }
  | { name: 'Computing'; metrics: ExtractedMetrics }
  | { name: 'Publishing'; profitability: ProfitabilityReport | null }
  | { name: 'Completed' }
  | { name: 'PartiallyCompleted'; failedSinks: readonly string[] }
  | { name: 'Failed'; cause: RunCause };

export const INITIAL_STATE: WorkflowState = { name: 'Idle' };

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export type WorkflowEvent =
  | { type: 'START' }
  | { type: 'PAGE_LOADED' }
  | { type: 'FORM_SUBMITTED' }
  | { type: 'METRICS_EXTRACTED'; metrics: ExtractedMetrics }
  | { type: 'COMPUTED'; profitability: ProfitabilityReport | null }
  | { type: 'PUBLISHED'; failedSinks: readonly string[] }
  | { type: 'FAIL'; cause: RunCause };

/**
 * Step-log name of the work done while in each state. Work in `Idle` is
 * opening the browser session.
 */
const STEP_NAME_BY_STATE: Record<WorkflowStateName, string> = {
  Idle: 'session',
  Navigating: 'navigate',
  Submitting: 'submit',
  Extracting: 'extract',
  Computing: 'compute',
  Publishing: 'publish',
  Completed: 'completed',
  PartiallyCompleted: 'partially-completed',
  Failed: 'failed',
};

export function stepNameFor(state: WorkflowStateName): string {
  return STEP_NAME_BY_STATE[state];
}

export function isTerminal(state: WorkflowState): boolean {
  return state.name === 'Completed' || state.name === 'PartiallyCompleted' || state.name === 'Failed';
}

/**
 * The single transition function of the workflow.
 *
 *   Idle → Navigating → Submitting → Extracting → Computing → Publishing
 *        → Completed | PartiallyCompleted
 *
 * `FAIL` moves any non-terminal state to the absorbing `Failed`. Terminal
 * states accept nothing.
 *
 * @throws InvalidTransitionError when the event is not legal in `state`
 */
export function transition(state: WorkflowState, event: WorkflowEvent): WorkflowState {
  if (isTerminal(state)) {
    throw new InvalidTransitionError(state.name, event.type);
  }
  if (event.type === 'FAIL') {
    return { name: 'Failed', cause: event.cause };
  }

  switch (state.name) {
    case 'Idle':
      if (event.type === 'START') return { name: 'Navigating' };
      break;
    case 'Navigating':
      if (event.type === 'PAGE_LOADED') return { name: 'Submitting' };
      break;
    case 'Submitting':
      if (event.type === 'FORM_SUBMITTED') return { name: 'Extracting' };
      break;
    case 'Extracting':
      if (event.type === 'METRICS_EXTRACTED') return { name: 'Computing', metrics: event.metrics };
      break;
    case 'Computing':
      if (event.type === 'COMPUTED') return { name: 'Publishing', profitability: event.profitability };
      break;
    case 'Publishing':
      if (event.type === 'PUBLISHED') {
        return event.failedSinks.length === 0
          ? { name: 'Completed' }
          : { name: 'PartiallyCompleted', failedSinks: event.failedSinks };
      }
      break;
  }

  throw new InvalidTransitionError(state.name, event.type);
}
