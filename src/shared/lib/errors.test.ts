import {
  ExtractionError,
  GatewayError,
  NonRetryableGatewayError,
  RunCancelledError,
  RunTimeoutError,
  SinkError,
  SolarCalcError,
  TransientGatewayError,
} from './errors.js';

describe('error hierarchy', () => {
  it('roots every error in SolarCalcError', () => {
    const errors = [
      new TransientGatewayError('t', 'navigate', 'https://estimator.test/'),
      new ExtractionError('no_numeric_match'),
      new SinkError('social-post', 'down'),
      new RunTimeoutError(1000, 'submit'),
    ];
    for (const err of errors) expect(err).toBeInstanceOf(SolarCalcError);
  });

  it('marks gateway errors retryable by class', () => {
    const transient = new TransientGatewayError('t', 'read', '');
    const rejected = new NonRetryableGatewayError('r', 'read', '');
    expect(transient).toBeInstanceOf(GatewayError);
    expect(transient.retryable).toBe(true);
    expect(rejected.retryable).toBe(false);
    expect(rejected.name).toBe('NonRetryableGatewayError');
  });

  it('names the sink and keeps the cause', () => {
    const cause = new Error('ECONNREFUSED');
    const err = new SinkError('marketplace', 'unreachable', cause);
    expect(err.message).toBe('Sink "marketplace" failed: unreachable');
    expect(err.cause).toBe(cause);
  });

  it('carries lifecycle reasons', () => {
    expect(new RunTimeoutError(5000, 'extract')).toMatchObject({
      reason: 'run_timeout',
      message: 'Run exceeded its 5000ms ceiling while in extract',
    });
    expect(new RunCancelledError('submit')).toMatchObject({
      reason: 'cancelled',
      message: 'Run cancelled before submit',
    });
  });
});
