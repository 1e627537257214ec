import { readFileSync } from 'node:fs';
import { isAbsolute, join } from 'node:path';
import type { GatewayConfig } from '@domain/types/config.js';
import type { IActionBackend, IActionGateway } from '@domain/ports/action-gateway.js';
import { ValidationError } from '@shared/lib/errors.js';
import { ActionGatewayAdapter } from './action-gateway-adapter.js';
import { HttpActionBackend } from './http-action-backend.js';
import { ReplayActionBackend } from './replay-action-backend.js';

export interface GatewayContext {
  /** Directory relative paths (the replay fixture) resolve against. */
  cwd: string;
  /** Bearer key for the remote agent, taken from the environment. */
  apiKey?: string;
}

type BackendFactory = (config: GatewayConfig, context: GatewayContext) => IActionBackend;

function httpBackend(config: GatewayConfig, context: GatewayContext): IActionBackend {
  if (!config.baseUrl) {
    throw new ValidationError('gateway.baseUrl is required for the http backend', [
      { path: ['gateway', 'baseUrl'], message: 'Required' },
    ]);
  }
  return new HttpActionBackend({
    baseUrl: config.baseUrl,
    apiKey: context.apiKey,
    requestTimeoutMs: config.actionTimeoutMs,
  });
}

function replayBackend(config: GatewayConfig, context: GatewayContext): IActionBackend {
  if (!config.replayFixture) {
    throw new ValidationError('gateway.replayFixture is required for the replay backend', [
      { path: ['gateway', 'replayFixture'], message: 'Required' },
    ]);
  }
  const path = isAbsolute(config.replayFixture) ? config.replayFixture : join(context.cwd, config.replayFixture);
  return new ReplayActionBackend(readFileSync(path, 'utf-8'));
}

/**
 * Builds the action gateway named in configuration. Backends are looked up
 * in a static registry keyed by `gateway.backend`.
 */
export class GatewayResolver {
  private static readonly registry = new Map<string, BackendFactory>([
    ['http', httpBackend],
    ['replay', replayBackend],
  ]);

  /**
   * @throws Error if the backend name is not registered
   * @throws ValidationError if the backend's settings are incomplete
   */
  static resolve(config: GatewayConfig, context: GatewayContext): IActionGateway {
    const factory = GatewayResolver.registry.get(config.backend);
    if (!factory) {
      const validList = [...GatewayResolver.registry.keys()].join(', ');
      throw new Error(`Unknown gateway backend: "${config.backend}". Valid backends are: ${validList}`);
    }
    return new ActionGatewayAdapter(factory(config, context));
  }
}
