import type { ISink } from '@domain/ports/sink.js';
import type { RunReport } from '@domain/types/run-report.js';
import type { SinkName, SinkResult } from '@domain/types/sink.js';
import { describeLocation } from '@domain/types/location.js';
import { formatTextReport } from '@domain/services/report-text.js';
import { postJson, type WebhookOptions } from './webhook.js';

export interface ReportDeliveryOptions extends WebhookOptions {
  /** Mailbox the relay forwards the report to; the relay's default when absent. */
  recipient?: string;
}

/** Sends the plain-text report through an email relay webhook. */
export class ReportDeliverySink implements ISink {
  readonly name: SinkName = 'report-delivery';

  constructor(private readonly options: ReportDeliveryOptions) {}

  async publish(report: RunReport): Promise<SinkResult> {
    await postJson(this.name, this.options, {
      ...(this.options.recipient ? { to: this.options.recipient } : {}),
      subject: `Solar profitability report: ${describeLocation(report.location)}`,
      text: formatTextReport(report),
    });
    return { status: 'success', detail: this.options.recipient ?? 'relay default recipient' };
  }
}
