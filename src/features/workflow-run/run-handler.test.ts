import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { applyOverrides, defaultConfig } from '@infra/config/config-loader.js';
import type { Logger } from '@shared/lib/logger.js';
import { createRunner, executeRun } from './run-handler.js';

const RESULTS_PAGE = `
  <div id="results">
    <p>Installed peak PV power [kWp]: 5</p>
    <p>Yearly PV energy production [kWh]: 6120</p>
  </div>`;

const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};

describe('run handler', () => {
  let cwd: string;
  let projectDir: string;

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), 'solarcalc-run-'));
    projectDir = join(cwd, '.solarcalc');
    writeFileSync(join(cwd, 'page.html'), RESULTS_PAGE);
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
  });

  const replayConfig = () =>
    applyOverrides(defaultConfig(), { gateway: { backend: 'replay', replayFixture: 'page.html' } });

  it('runs a replayed page end to end and stores the report and dashboard', async () => {
    const runner = createRunner({ cwd, projectDir, config: replayConfig(), secrets: {}, logger: silentLogger });

    const { report, savedTo } = await executeRun(runner, '123 Solar Ave');

    expect(report.state).toBe('Completed');
    expect(report.steps.map((s) => s.stepName)).toEqual([
      'navigate',
      'submit',
      'extract',
      'compute',
      'sink:visualization',
    ]);
    expect(savedTo).toBe(join(projectDir, 'reports', `${report.runId}.json`));
    expect(existsSync(join(projectDir, 'dashboards', `${report.runId}.json`))).toBe(true);
    expect(runner.store?.get(report.runId).profitability?.estimatedSystemCost).toBe(6000);
  });

  it('publishes nothing when sinks are turned off', async () => {
    const runner = createRunner({
      cwd,
      projectDir,
      config: replayConfig(),
      secrets: {},
      publish: false,
      logger: silentLogger,
    });

    const { report } = await executeRun(runner, '123 Solar Ave');

    expect(report.steps.map((s) => s.stepName)).not.toContain('sink:visualization');
    expect(existsSync(join(projectDir, 'dashboards'))).toBe(false);
  });

  it('stores nothing outside a project', async () => {
    const runner = createRunner({ cwd, projectDir: null, config: replayConfig(), secrets: {}, logger: silentLogger });

    const { report, savedTo } = await executeRun(runner, '14.69,-17.45');

    expect(runner.store).toBeNull();
    expect(savedTo).toBeNull();
    expect(report.state).toBe('Completed');
    expect(report.location).toEqual({ kind: 'coordinates', lat: 14.69, lon: -17.45 });
  });
});
