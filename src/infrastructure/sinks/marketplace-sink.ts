import type { ISink } from '@domain/ports/sink.js';
import type { RunReport } from '@domain/types/run-report.js';
import type { SinkName, SinkResult } from '@domain/types/sink.js';
import { SinkError } from '@shared/lib/errors.js';
import { SINK_REQUEST_TIMEOUT_MS } from './webhook.js';

export type LinkOpener = (url: string) => Promise<void>;

export interface MarketplaceSinkOptions {
  storefrontUrl: string;
  /** Defaults to an HTTP reachability check of the link. */
  opener?: LinkOpener;
  fetch?: typeof fetch;
  timeoutMs?: number;
}

/** Kit size to shop for: the system size rounded up to the next half kW. */
export function recommendedKitKw(report: RunReport): number | null {
  const size =
    report.profitability?.systemSizeKw ?? (report.metrics?.valid ? report.metrics.peakPowerKw : undefined);
  if (size === undefined || !(size > 0)) return null;
  return Math.ceil(size * 2) / 2;
}

export function buildStorefrontLink(storefrontUrl: string, kitKw: number | null): string {
  const url = new URL(storefrontUrl);
  url.searchParams.set('k', kitKw === null ? 'solar panel kit' : `${kitKw} kW solar panel kit`);
  return url.toString();
}

/** Opens a storefront search for a solar kit matching the run's system size. */
export class MarketplaceSink implements ISink {
  readonly name: SinkName = 'marketplace';

  private readonly opener: LinkOpener;

  constructor(private readonly options: MarketplaceSinkOptions) {
    const fetchFn = options.fetch ?? fetch;
    this.opener =
      options.opener ??
      (async (url) => {
        const response = await fetchFn(url, {
          method: 'HEAD',
          redirect: 'follow',
          signal: AbortSignal.timeout(options.timeoutMs ?? SINK_REQUEST_TIMEOUT_MS),
        });
        if (!response.ok) throw new Error(`storefront answered HTTP ${response.status}`);
      });
  }

  async publish(report: RunReport): Promise<SinkResult> {
    const link = buildStorefrontLink(this.options.storefrontUrl, recommendedKitKw(report));
    try {
      await this.opener(link);
    } catch (err) {
      throw new SinkError(this.name, err instanceof Error ? err.message : String(err), err);
    }
    return { status: 'success', detail: link };
  }
}
