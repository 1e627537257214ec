import type { ISink } from '@domain/ports/sink.js';
import type { SinksConfig } from '@domain/types/config.js';
import { ValidationError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';
import type { Secrets } from '@infra/config/config-loader.js';
import { VisualizationSink } from './visualization-sink.js';
import { SocialPostSink } from './social-post-sink.js';
import { MarketplaceSink, type LinkOpener } from './marketplace-sink.js';
import { ReportDeliverySink } from './report-delivery-sink.js';

export interface SinkContext {
  /** `.solarcalc/dashboards`; null outside a project, which skips the visualization sink. */
  dashboardsDir: string | null;
  secrets: Secrets;
  fetch?: typeof fetch;
  opener?: LinkOpener;
}

function requireUrl(value: string | undefined, key: string): string {
  if (!value) {
    throw new ValidationError(`${key} is required when the sink is enabled`, [{ path: key.split('.'), message: 'Required' }]);
  }
  return value;
}

/**
 * Builds the enabled sinks from configuration, in a fixed order:
 * visualization, social-post, marketplace, report-delivery.
 */
export const SinkResolver = {
  /**
   * @throws ValidationError when an enabled sink lacks its endpoint
   */
  resolve(config: SinksConfig, context: SinkContext): ISink[] {
    const sinks: ISink[] = [];

    if (config.visualization.enabled) {
      if (context.dashboardsDir) {
        sinks.push(new VisualizationSink(context.dashboardsDir));
      } else {
        logger.info('No .solarcalc/ directory: visualization sink skipped');
      }
    }

    if (config.socialPost.enabled) {
      sinks.push(
        new SocialPostSink({
          url: requireUrl(config.socialPost.webhookUrl, 'sinks.socialPost.webhookUrl'),
          token: context.secrets.socialToken,
          fetch: context.fetch,
        }),
      );
    }

    if (config.marketplace.enabled) {
      sinks.push(
        new MarketplaceSink({
          storefrontUrl: config.marketplace.storefrontUrl,
          opener: context.opener,
          fetch: context.fetch,
        }),
      );
    }

    if (config.reportDelivery.enabled) {
      sinks.push(
        new ReportDeliverySink({
          url: requireUrl(config.reportDelivery.webhookUrl, 'sinks.reportDelivery.webhookUrl'),
          token: context.secrets.deliveryToken,
          recipient: config.reportDelivery.recipient,
          fetch: context.fetch,
        }),
      );
    }

    return sinks;
  },
};
