import { join } from 'node:path';
import type { IPersistence } from '@domain/ports/persistence.js';
import type { EconomicAssumptions } from '@domain/types/economics.js';
import {
  SolarCalcConfigSchema,
  type FlowConfig,
  type GatewayConfig,
  type SolarCalcConfig,
  type WorkflowConfig,
} from '@domain/types/config.js';
import { SOLARCALC_DIRS } from '@shared/constants/paths.js';
import { ValidationError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';
import { JsonStore } from '@infra/persistence/json-store.js';

/** Environment variables holding credentials. Secrets never live in config.json. */
export const SECRET_ENV_VARS = {
  gatewayApiKey: 'SOLARCALC_GATEWAY_API_KEY',
  socialToken: 'SOLARCALC_SOCIAL_TOKEN',
  deliveryToken: 'SOLARCALC_DELIVERY_TOKEN',
} as const;

export type Secrets = { [K in keyof typeof SECRET_ENV_VARS]?: string };

/** Values given on the command line; they win over the config file. */
export interface ConfigOverrides {
  economics?: Partial<EconomicAssumptions>;
  flow?: Partial<FlowConfig>;
  gateway?: Partial<GatewayConfig>;
  workflow?: Partial<WorkflowConfig>;
}

export function configPath(solarcalcDir: string): string {
  return join(solarcalcDir, SOLARCALC_DIRS.config);
}

export function defaultConfig(): SolarCalcConfig {
  return SolarCalcConfigSchema.parse({});
}

export function readSecrets(env: NodeJS.ProcessEnv = process.env): Secrets {
  const read = (variable: string) => env[variable]?.trim() || undefined;
  return {
    gatewayApiKey: read(SECRET_ENV_VARS.gatewayApiKey),
    socialToken: read(SECRET_ENV_VARS.socialToken),
    deliveryToken: read(SECRET_ENV_VARS.deliveryToken),
  };
}

/** Drop keys whose value is undefined, so they do not mask configured values. */
function defined(values: object | undefined): Record<string, unknown> {
  if (!values) return {};
  return Object.fromEntries(Object.entries(values).filter(([, v]) => v !== undefined));
}

/**
 * Load `.solarcalc/config.json`. Without a project directory, or without a
 * config file in it, the defaults apply.
 *
 * @throws ValidationError when the file exists but does not match the schema
 */
export function loadConfig(solarcalcDir: string | null, persistence: IPersistence = JsonStore): SolarCalcConfig {
  if (!solarcalcDir) return defaultConfig();

  const path = configPath(solarcalcDir);
  if (!persistence.exists(path)) {
    logger.debug('No config file, using defaults', { path });
    return defaultConfig();
  }

  try {
    return persistence.read(path, SolarCalcConfigSchema);
  } catch (err) {
    throw new ValidationError(`Invalid configuration in ${path}: ${err instanceof Error ? err.message : String(err)}`, [
      err,
    ]);
  }
}

/**
 * Layer command-line values over a loaded config and re-validate the result.
 *
 * @throws ValidationError when an override is out of range
 */
export function applyOverrides(config: SolarCalcConfig, overrides: ConfigOverrides): SolarCalcConfig {
  const merged = {
    ...config,
    economics: { ...config.economics, ...defined(overrides.economics) },
    flow: { ...config.flow, ...defined(overrides.flow) },
    gateway: { ...config.gateway, ...defined(overrides.gateway) },
    workflow: { ...config.workflow, ...defined(overrides.workflow) },
  };
  const result = SolarCalcConfigSchema.safeParse(merged);
  if (!result.success) {
    const summary = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ValidationError(`Invalid option: ${summary}`, result.error.issues);
  }
  return result.data;
}

/** Write a config file holding every default, for `solarcalc init`. */
export function writeDefaultConfig(solarcalcDir: string, persistence: IPersistence = JsonStore): string {
  const path = configPath(solarcalcDir);
  persistence.write(path, defaultConfig(), SolarCalcConfigSchema);
  return path;
}
