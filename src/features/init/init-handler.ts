import { join } from 'node:path';
import { existsSync } from 'node:fs';
import {
  SolarCalcConfigSchema,
  type GatewayBackendType,
  type SolarCalcConfig,
} from '@domain/types/config.js';
import { JsonStore } from '@infra/persistence/json-store.js';
import { configPath, loadConfig } from '@infra/config/config-loader.js';
import { SOLARCALC_DIRS } from '@shared/constants/paths.js';
import { logger } from '@shared/lib/logger.js';

export interface InitOptions {
  cwd: string;
  backend?: GatewayBackendType;
  baseUrl?: string;
  electricityPricePerKwh?: number;
  skipPrompts?: boolean;
  /** Overwrite an existing config.json without asking. */
  force?: boolean;
}

export interface InitResult {
  projectDir: string;
  configPath: string;
  config: SolarCalcConfig;
  /** False when an existing config was kept as it was. */
  configWritten: boolean;
}

function isAbsoluteUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

interface Answers {
  backend?: GatewayBackendType;
  baseUrl?: string;
  electricityPricePerKwh?: number;
}

/**
 * Ask for the settings a first run needs. Only called when prompts are enabled.
 */
async function promptOptions(defaults: Answers): Promise<Answers> {
  const { select, input } = await import('@inquirer/prompts');

  const backend = await select<GatewayBackendType>({
    message: 'Select browser automation backend:',
    choices: [
      { name: 'Remote agent over HTTP', value: 'http' },
      { name: 'Replay a captured results page (offline)', value: 'replay' },
    ],
    default: defaults.backend ?? 'http',
  });

  const baseUrl =
    backend === 'http'
      ? await input({
          message: 'Agent base URL:',
          default: defaults.baseUrl,
          validate: (value) => isAbsoluteUrl(value) || 'Enter an absolute URL',
        })
      : undefined;

  const price = await input({
    message: 'Electricity price per kWh:',
    default: String(defaults.electricityPricePerKwh ?? 0.15),
    validate: (value) => (Number.isFinite(Number(value)) && Number(value) >= 0) || 'Enter a number of zero or more',
  });

  return { backend, baseUrl, electricityPricePerKwh: Number(price) };
}

/**
 * Initialize a solarcalc project.
 *
 * Flow:
 * 1. Create .solarcalc/ with reports/, dashboards/ and fixtures/
 * 2. Keep an existing config.json unless asked to overwrite it
 * 3. Otherwise write config.json from the answers (or flags) over the defaults
 */
export async function handleInit(options: InitOptions): Promise<InitResult> {
  const { cwd, skipPrompts = false } = options;
  const projectDir = join(cwd, SOLARCALC_DIRS.root);
  const path = configPath(projectDir);

  for (const sub of [SOLARCALC_DIRS.reports, SOLARCALC_DIRS.dashboards, SOLARCALC_DIRS.fixtures]) {
    JsonStore.ensureDir(join(projectDir, sub));
  }

  if (existsSync(path) && !options.force) {
    let overwrite = false;
    if (!skipPrompts) {
      const { confirm } = await import('@inquirer/prompts');
      overwrite = await confirm({
        message: 'A .solarcalc/config.json already exists. Overwrite it?',
        default: false,
      });
    }
    if (!overwrite) {
      logger.info('Keeping existing config', { path });
      return { projectDir, configPath: path, config: loadConfig(projectDir), configWritten: false };
    }
  }

  let answers: Answers = {
    backend: options.backend,
    baseUrl: options.baseUrl,
    electricityPricePerKwh: options.electricityPricePerKwh,
  };
  if (!skipPrompts && !options.backend) {
    answers = await promptOptions(answers);
  }

  const config = SolarCalcConfigSchema.parse({
    gateway: {
      ...(answers.backend ? { backend: answers.backend } : {}),
      ...(answers.baseUrl ? { baseUrl: answers.baseUrl } : {}),
    },
    economics: answers.electricityPricePerKwh !== undefined
      ? { electricityPricePerKwh: answers.electricityPricePerKwh }
      : {},
  });
  JsonStore.write(path, config, SolarCalcConfigSchema);
  logger.debug('Wrote config', { path, backend: config.gateway.backend });

  return { projectDir, configPath: path, config, configWritten: true };
}
