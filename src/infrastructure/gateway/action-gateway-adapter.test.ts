import { InvalidActionError } from '@shared/lib/errors.js';
import { ActionGatewayAdapter } from './action-gateway-adapter.js';
import { ReplayActionBackend } from './replay-action-backend.js';

const PAGE = 'Yearly PV energy production [kWh]: 6120';

describe('ActionGatewayAdapter', () => {
  it('maps a submit onto typing each field, then clicking', async () => {
    const backend = new ReplayActionBackend(PAGE);
    const session = await new ActionGatewayAdapter(backend).openSession();

    const result = await session.perform(
      {
        kind: 'submit',
        target: 'Visualize results',
        payload: {
          fields: [
            { target: 'Address', value: '123 Solar Ave' },
            { target: 'System loss [%]', value: '14' },
          ],
        },
      },
      1000,
    );

    expect(result).toMatchObject({ status: 'success', payload: null, rawError: null });
    expect(backend.journal).toEqual([
      'type Address=123 Solar Ave',
      'type System loss [%]=14',
      'click Visualize results',
    ]);
  });

  it('types text for an input', async () => {
    const backend = new ReplayActionBackend(PAGE);
    const session = await new ActionGatewayAdapter(backend).openSession();

    await session.perform({ kind: 'input', target: '#inputAddress', payload: { text: '123 Solar Ave' } }, 1000);

    expect(backend.journal).toEqual(['type #inputAddress=123 Solar Ave']);
  });

  it('returns page text for a read and reads the body when no region is given', async () => {
    const backend = new ReplayActionBackend(PAGE);
    const session = await new ActionGatewayAdapter(backend).openSession();

    const result = await session.perform({ kind: 'read', target: '', payload: { capture: 'text' } }, 1000);

    expect(result.payload).toBe(PAGE);
    expect(backend.journal).toEqual(['read body']);
  });

  it('takes a screenshot when asked to', async () => {
    const backend = new ReplayActionBackend(PAGE);
    const session = await new ActionGatewayAdapter(backend).openSession();

    await session.perform({ kind: 'read', target: '', payload: { capture: 'screenshot' } }, 1000);

    expect(backend.journal).toEqual(['screenshot']);
  });

  it('reports a backend rejection as a failure', async () => {
    const backend = new ReplayActionBackend(PAGE);
    vi.spyOn(backend, 'click').mockRejectedValue(new Error('element not found'));
    const session = await new ActionGatewayAdapter(backend).openSession();

    const result = await session.perform({ kind: 'submit', target: '#btviewPV', payload: { fields: [] } }, 1000);

    expect(result).toMatchObject({ status: 'failure', payload: null, rawError: 'element not found' });
  });

  it('reports a call outliving its bound as a timeout', async () => {
    const backend = new ReplayActionBackend(PAGE);
    vi.spyOn(backend, 'navigate').mockReturnValue(new Promise<void>(() => {}));
    const session = await new ActionGatewayAdapter(backend).openSession();

    const result = await session.perform({ kind: 'navigate', target: 'https://estimator.test/' }, 10);

    expect(result).toMatchObject({ status: 'timeout', payload: null, rawError: null });
  });

  it('measures duration with the injected clock', async () => {
    let now = 0;
    const backend = new ReplayActionBackend(PAGE);
    vi.spyOn(backend, 'navigate').mockImplementation(async () => {
      now += 40;
    });
    const session = await new ActionGatewayAdapter(backend, () => now).openSession();

    const result = await session.perform({ kind: 'navigate', target: 'https://estimator.test/' }, 1000);

    expect(result.durationMs).toBe(40);
  });

  it('rejects malformed requests', async () => {
    const adapter = new ActionGatewayAdapter(new ReplayActionBackend(PAGE));
    const session = await adapter.openSession();

    await expect(session.perform({ kind: 'navigate', target: '  ' }, 1000)).rejects.toThrow(InvalidActionError);
    await expect(session.perform({ kind: 'read', target: '' }, 0)).rejects.toThrow(
      'timeoutMs must be positive (got 0)',
    );
  });

  it('closes once and refuses actions afterwards', async () => {
    const backend = new ReplayActionBackend(PAGE);
    const closeSpy = vi.spyOn(backend, 'close');
    const session = await new ActionGatewayAdapter(backend).openSession();

    await session.close();
    await session.close();

    expect(closeSpy).toHaveBeenCalledTimes(1);
    await expect(session.perform({ kind: 'read', target: '' }, 1000)).rejects.toThrow(
      'Browser session replay-1 is closed',
    );
  });
});
