import { createLogger, errorFields } from './logger.js';

describe('createLogger', () => {
  let writes: string[];

  beforeEach(() => {
    writes = [];
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      writes.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops entries below the configured level', () => {
    const log = createLogger({ level: 'warn' });
    log.info('hidden');
    log.warn('shown');
    expect(writes).toEqual(['\x1b[33m[warn]\x1b[0m shown\n']);
  });

  it('writes plain info lines with their fields', () => {
    createLogger().info('Run started', { runId: 'r1' });
    expect(writes).toEqual(['[info] Run started {"runId":"r1"}\n']);
  });

  it('merges child bindings into every entry', () => {
    const log = createLogger({ json: true }).child({ runId: 'r1' }).child({ step: 'navigate' });
    log.info('Attempt', { attempt: 2 });
    expect(writes).toHaveLength(1);
    expect(JSON.parse(writes[0] ?? '')).toMatchObject({
      level: 'info',
      message: 'Attempt',
      runId: 'r1',
      step: 'navigate',
      attempt: 2,
    });
  });
});

describe('errorFields', () => {
  it('reads name and message from errors', () => {
    expect(errorFields(new TypeError('bad'))).toEqual({ error: 'bad', errorName: 'TypeError' });
  });

  it('stringifies anything else', () => {
    expect(errorFields(42)).toEqual({ error: '42' });
  });
});
