import { z } from 'zod/v4';

export const SinkStatus = z.enum(['success', 'failure']);
export type SinkStatus = z.infer<typeof SinkStatus>;

export const SinkName = z.enum(['visualization', 'social-post', 'marketplace', 'report-delivery']);
export type SinkName = z.infer<typeof SinkName>;

export interface SinkResult {
  status: SinkStatus;
  /** Where the output went (file path, post id, URL) or why it did not. */
  detail?: string;
}

/** Step-log name under which a sink's outcome is recorded. */
export function sinkStepName(sinkName: string): string {
  return `sink:${sinkName}`;
}
