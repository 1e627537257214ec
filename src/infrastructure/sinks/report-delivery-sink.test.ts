import { formatTextReport } from '@domain/services/report-text.js';
import { failedReport } from '@shared/testing/run-report-fixtures.js';
import { ReportDeliverySink } from './report-delivery-sink.js';

describe('ReportDeliverySink', () => {
  it('sends the text report to the recipient', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('{}', { status: 202 }));
    const sink = new ReportDeliverySink({
      url: 'https://hooks.test/mail',
      recipient: 'owner@example.com',
      fetch: fetchMock,
    });
    const report = failedReport();

    const result = await sink.publish(report);

    expect(result).toEqual({ status: 'success', detail: 'owner@example.com' });
    const init = fetchMock.mock.calls[0]?.[1];
    expect(typeof init?.body === 'string' ? JSON.parse(init.body) : null).toEqual({
      to: 'owner@example.com',
      subject: 'Solar profitability report: 123 Solar Ave',
      text: formatTextReport(report),
    });
  });

  it('leaves the recipient to the relay when none is configured', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('{}', { status: 200 }));
    const sink = new ReportDeliverySink({ url: 'https://hooks.test/mail', fetch: fetchMock });

    const result = await sink.publish(failedReport());

    expect(result.detail).toBe('relay default recipient');
    const init = fetchMock.mock.calls[0]?.[1];
    expect(typeof init?.body === 'string' ? JSON.parse(init.body) : null).not.toHaveProperty('to');
  });
});
