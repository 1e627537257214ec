export class SolarCalcError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SolarCalcError';
  }
}

export class ConfigNotFoundError extends SolarCalcError {
  constructor(path: string) {
    super(
      `No .solarcalc/ directory found at ${path}. Run "solarcalc init" to initialize your project.`,
    );
    this.name = 'ConfigNotFoundError';
  }
}

export class ValidationError extends SolarCalcError {
  constructor(
    message: string,
    public readonly issues: unknown[],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ReportNotFoundError extends SolarCalcError {
  constructor(id: string) {
    super(`Run report not found: "${id}". Run "solarcalc report list" to see stored reports.`);
    this.name = 'ReportNotFoundError';
  }
}

// ---------------------------------------------------------------------------
// Gateway
// ---------------------------------------------------------------------------

/** Base for errors raised from an action gateway outcome. */
export abstract class GatewayError extends SolarCalcError {
  abstract readonly retryable: boolean;

  constructor(
    message: string,
    public readonly actionKind: string,
    public readonly target: string,
  ) {
    super(message);
  }
}

/** Timeout or temporary navigation failure, expected to clear on retry. */
export class TransientGatewayError extends GatewayError {
  readonly retryable = true;

  constructor(message: string, actionKind: string, target: string) {
    super(message, actionKind, target);
    this.name = 'TransientGatewayError';
  }
}

/** Target not found or action rejected; retrying unchanged will not help. */
export class NonRetryableGatewayError extends GatewayError {
  readonly retryable = false;

  constructor(message: string, actionKind: string, target: string) {
    super(message, actionKind, target);
    this.name = 'NonRetryableGatewayError';
  }
}

export class InvalidActionError extends SolarCalcError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidActionError';
  }
}

// ---------------------------------------------------------------------------
// Extraction / computation
// ---------------------------------------------------------------------------

export type ExtractionFailureReason = 'no_numeric_match' | 'out_of_range';

export class ExtractionError extends SolarCalcError {
  constructor(public readonly reason: ExtractionFailureReason) {
    super(`Could not extract annual yield from page content (${reason})`);
    this.name = 'ExtractionError';
  }
}

export type ComputationErrorKind = 'InvalidInput' | 'DivisionByZero';

export class ComputationError extends SolarCalcError {
  constructor(
    public readonly kind: ComputationErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'ComputationError';
  }
}

// ---------------------------------------------------------------------------
// Publishing
// ---------------------------------------------------------------------------

export class SinkError extends SolarCalcError {
  constructor(
    public readonly sinkName: string,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(`Sink "${sinkName}" failed: ${message}`);
    this.name = 'SinkError';
  }
}

// ---------------------------------------------------------------------------
// Run lifecycle
// ---------------------------------------------------------------------------

export class RunTimeoutError extends SolarCalcError {
  readonly reason = 'run_timeout';

  constructor(
    public readonly timeoutMs: number,
    public readonly activeStep: string,
  ) {
    super(`Run exceeded its ${timeoutMs}ms ceiling while in ${activeStep}`);
    this.name = 'RunTimeoutError';
  }
}

export class RunCancelledError extends SolarCalcError {
  readonly reason = 'cancelled';

  constructor(public readonly beforeStep: string) {
    super(`Run cancelled before ${beforeStep}`);
    this.name = 'RunCancelledError';
  }
}

export class RunInProgressError extends SolarCalcError {
  constructor(public readonly activeRunId: string) {
    super(`A run is already in progress (${activeRunId}); the browser session is busy.`);
    this.name = 'RunInProgressError';
  }
}

export class SealedReportError extends SolarCalcError {
  constructor(runId: string) {
    super(`Run report ${runId} is sealed and can no longer be modified`);
    this.name = 'SealedReportError';
  }
}

export class InvalidTransitionError extends SolarCalcError {
  constructor(from: string, event: string) {
    super(`Invalid workflow transition: "${event}" is not allowed in state ${from}`);
    this.name = 'InvalidTransitionError';
  }
}
