import { z } from 'zod/v4';
import type { ISink } from '@domain/ports/sink.js';
import type { RunReport } from '@domain/types/run-report.js';
import type { SinkName, SinkResult } from '@domain/types/sink.js';
import { composeSocialPost } from '@domain/services/report-text.js';
import { postJson, type WebhookOptions } from './webhook.js';

const PostResponseSchema = z.object({ id: z.union([z.string(), z.number()]) });

/** Posts a short run summary to a social-media webhook. */
export class SocialPostSink implements ISink {
  readonly name: SinkName = 'social-post';

  constructor(private readonly webhook: WebhookOptions) {}

  async publish(report: RunReport): Promise<SinkResult> {
    const text = composeSocialPost(report);
    const body = await postJson(this.name, this.webhook, { text });
    const parsed = PostResponseSchema.safeParse(body);
    return { status: 'success', detail: parsed.success ? `post ${parsed.data.id}` : `posted ${text.length} chars` };
  }
}
