import { z } from 'zod/v4';
import { EconomicAssumptionsSchema } from './economics.js';

export const GatewayBackendType = z.enum(['http', 'replay']);
export type GatewayBackendType = z.infer<typeof GatewayBackendType>;

export const BusyPolicy = z.enum(['reject', 'queue']);
export type BusyPolicy = z.infer<typeof BusyPolicy>;

export const FlowConfigSchema = z.object({
  /** Entry page of the solar estimation tool. */
  estimatorUrl: z.string().url().default('https://re.jrc.ec.europa.eu/pvg_tools/en/'),
  /** Installed peak power typed into the estimator form, in kWp. */
  systemSizeKw: z.number().positive().default(5),
  /** System loss typed into the estimator form, in percent. */
  systemLossPct: z.number().min(0).max(100).default(14),
});

export const GatewayConfigSchema = z.object({
  backend: GatewayBackendType.default('http'),
  /** Base URL of the remote automation agent (http backend). */
  baseUrl: z.string().url().optional(),
  /** Per-action wait bound. */
  actionTimeoutMs: z.number().int().positive().default(30_000),
  /** Captured results page served by the replay backend. */
  replayFixture: z.string().optional(),
});

export const WorkflowConfigSchema = z.object({
  /** Maximum attempts per spine step, first attempt included. */
  retryBound: z.number().int().min(1).default(3),
  backoffBaseMs: z.number().int().min(0).default(1_000),
  backoffMaxMs: z.number().int().min(0).default(8_000),
  /** Ceiling for a whole run; exceeding it fails the run with `run_timeout`. */
  runTimeoutMs: z.number().int().positive().default(300_000),
  /** What a second run does while the session is busy. */
  onBusy: BusyPolicy.default('reject'),
});

export const SinksConfigSchema = z.object({
  visualization: z.object({
    enabled: z.boolean().default(true),
  }).default(() => ({ enabled: true })),
  socialPost: z.object({
    enabled: z.boolean().default(false),
    webhookUrl: z.string().url().optional(),
  }).default(() => ({ enabled: false })),
  marketplace: z.object({
    enabled: z.boolean().default(false),
    storefrontUrl: z.string().url().default('https://www.amazon.com/s'),
  }).default(() => ({ enabled: false, storefrontUrl: 'https://www.amazon.com/s' })),
  reportDelivery: z.object({
    enabled: z.boolean().default(false),
    webhookUrl: z.string().url().optional(),
    recipient: z.string().email().optional(),
  }).default(() => ({ enabled: false })),
});

export const SolarCalcConfigSchema = z.object({
  economics: EconomicAssumptionsSchema.default(() => EconomicAssumptionsSchema.parse({})),
  flow: FlowConfigSchema.default(() => FlowConfigSchema.parse({})),
  gateway: GatewayConfigSchema.default(() => GatewayConfigSchema.parse({})),
  workflow: WorkflowConfigSchema.default(() => WorkflowConfigSchema.parse({})),
  sinks: SinksConfigSchema.default(() => SinksConfigSchema.parse({})),
  batch: z.object({
    /** Pause between consecutive runs of a batch, sparing the remote agent. */
    pauseMs: z.number().int().min(0).default(30_000),
  }).default(() => ({ pauseMs: 30_000 })),
});

export type FlowConfig = z.infer<typeof FlowConfigSchema>;
export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
export type WorkflowConfig = z.infer<typeof WorkflowConfigSchema>;
export type SinksConfig = z.infer<typeof SinksConfigSchema>;
export type SolarCalcConfig = z.infer<typeof SolarCalcConfigSchema>;
