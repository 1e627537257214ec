import { join } from 'node:path';
import type { IActionGateway } from '@domain/ports/action-gateway.js';
import type { ISink } from '@domain/ports/sink.js';
import type { SolarCalcConfig } from '@domain/types/config.js';
import type { RunReport } from '@domain/types/run-report.js';
import { GatewayResolver } from '@infra/gateway/gateway-resolver.js';
import { SinkResolver } from '@infra/sinks/sink-resolver.js';
import type { LinkOpener } from '@infra/sinks/marketplace-sink.js';
import { ReportStore } from '@infra/persistence/report-store.js';
import type { Secrets } from '@infra/config/config-loader.js';
import { SOLARCALC_DIRS } from '@shared/constants/paths.js';
import { logger as defaultLogger, errorFields, type Logger } from '@shared/lib/logger.js';
import {
  WorkflowOrchestrator,
  type RunOptions,
  type WorkflowOrchestratorDeps,
} from './workflow-orchestrator.js';

export interface RunnerOptions {
  cwd: string;
  /** The .solarcalc/ directory, or null outside a project (nothing is stored then). */
  projectDir: string | null;
  config: SolarCalcConfig;
  secrets: Secrets;
  /** False skips every sink. */
  publish?: boolean;
  /** Test seams. */
  gateway?: IActionGateway;
  sinks?: readonly ISink[];
  fetch?: typeof fetch;
  opener?: LinkOpener;
  sleep?: (ms: number) => Promise<void>;
  hooks?: WorkflowOrchestratorDeps['hooks'];
  logger?: Logger;
}

export interface Runner {
  orchestrator: WorkflowOrchestrator;
  store: ReportStore | null;
}

export interface RunOutcome {
  report: RunReport;
  /** Where the sealed report was stored, when it was. */
  savedTo: string | null;
}

/**
 * Assemble an orchestrator from configuration: the configured gateway
 * backend, the enabled sinks and, inside a project, the report store.
 */
export function createRunner(options: RunnerOptions): Runner {
  const { config, projectDir } = options;
  const logger = options.logger ?? defaultLogger;

  const gateway =
    options.gateway ??
    GatewayResolver.resolve(config.gateway, { cwd: options.cwd, apiKey: options.secrets.gatewayApiKey });

  const sinks =
    options.publish === false
      ? []
      : (options.sinks ??
        SinkResolver.resolve(config.sinks, {
          dashboardsDir: projectDir ? join(projectDir, SOLARCALC_DIRS.dashboards) : null,
          secrets: options.secrets,
          fetch: options.fetch,
          opener: options.opener,
        }));

  const orchestrator = new WorkflowOrchestrator(
    { gateway, sinks, sleep: options.sleep, hooks: options.hooks, logger },
    {
      assumptions: config.economics,
      flow: config.flow,
      workflow: config.workflow,
      actionTimeoutMs: config.gateway.actionTimeoutMs,
    },
  );

  return {
    orchestrator,
    store: projectDir ? new ReportStore(join(projectDir, SOLARCALC_DIRS.reports)) : null,
  };
}

/**
 * Run one location and store the sealed report. A failure to store is
 * logged; the report is still returned.
 */
export async function executeRun(runner: Runner, location: string, options: RunOptions = {}): Promise<RunOutcome> {
  const report = await runner.orchestrator.run(location, options);
  if (!runner.store) return { report, savedTo: null };

  try {
    return { report, savedTo: runner.store.save(report) };
  } catch (err) {
    defaultLogger.warn('Could not store run report', { runId: report.runId, ...errorFields(err) });
    return { report, savedTo: null };
  }
}
