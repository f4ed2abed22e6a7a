import { readFileSync, existsSync } from 'node:fs';
import path from 'node:path';
import yaml from 'yaml';
import { z } from 'zod';

export type PendingPolicy = 'leave' | 'reject';

export interface MarketplaceConfig {
  sweepIntervalMs: number;
  pendingOnCompletion: PendingPolicy;
  redemptionCodeLength: number;
  redemptionCodeAttempts: number;
  dataFile?: string;
  debugEvents: boolean;
}

const fileSchema = z.object({
  sweep: z.object({
    interval_ms: z.number().int().min(1000).optional(),
    pending_on_completion: z.enum(['leave', 'reject']).optional()
  }).strict().optional(),
  redemption: z.object({
    code_length: z.number().int().min(6).max(32).optional(),
    max_attempts: z.number().int().min(1).max(20).optional()
  }).strict().optional(),
  data_file: z.string().min(1).optional(),
  debug_events: z.boolean().optional()
}).strict();

const intFromEnv = (min: number, max: number) =>
  z.string().regex(/^\d+$/, 'must be an integer').transform(Number).pipe(z.number().int().min(min).max(max));

const envSchema = z.object({
  SWEEP_INTERVAL_MS: intFromEnv(1000, 24 * 3600 * 1000).optional(),
  PENDING_ON_COMPLETION: z.enum(['leave', 'reject']).optional(),
  REDEMPTION_CODE_LENGTH: intFromEnv(6, 32).optional(),
  REDEMPTION_CODE_ATTEMPTS: intFromEnv(1, 20).optional(),
  MARKETPLACE_DATA_FILE: z.string().min(1).optional(),
  DEBUG_EVENTS: z.string().optional()
});

export const DEFAULT_CONFIG: MarketplaceConfig = {
  sweepIntervalMs: 60_000,
  pendingOnCompletion: 'leave',
  redemptionCodeLength: 10,
  redemptionCodeAttempts: 5,
  debugEvents: false
};

function describeIssues(where: string, error: z.ZodError) {
  return `Invalid ${where}: ${error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')}`;
}

// Empty strings count as unset, so `FOO=` in .env does not trip validation.
function presentOnly(env: NodeJS.ProcessEnv) {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) if (v !== undefined && v !== '') out[k] = v;
  return out;
}

export interface LoadConfigOptions {
  file?: string;
  env?: NodeJS.ProcessEnv;
}

export function loadConfig(opts: LoadConfigOptions = {}): MarketplaceConfig {
  const env = opts.env ?? process.env;
  const file = opts.file ?? env.MARKETPLACE_CONFIG ?? path.join(process.cwd(), 'config', 'marketplace.yaml');

  let fromFile: z.infer<typeof fileSchema> = {};
  if (existsSync(file)) {
    const parsed = fileSchema.safeParse(yaml.parse(readFileSync(file, 'utf8')) ?? {});
    if (!parsed.success) throw new Error(describeIssues(`config file ${file}`, parsed.error));
    fromFile = parsed.data;
  }

  const parsedEnv = envSchema.safeParse(presentOnly(env));
  if (!parsedEnv.success) throw new Error(describeIssues('environment', parsedEnv.error));
  const e = parsedEnv.data;

  return {
    sweepIntervalMs: e.SWEEP_INTERVAL_MS ?? fromFile.sweep?.interval_ms ?? DEFAULT_CONFIG.sweepIntervalMs,
    pendingOnCompletion: e.PENDING_ON_COMPLETION ?? fromFile.sweep?.pending_on_completion ?? DEFAULT_CONFIG.pendingOnCompletion,
    redemptionCodeLength: e.REDEMPTION_CODE_LENGTH ?? fromFile.redemption?.code_length ?? DEFAULT_CONFIG.redemptionCodeLength,
    redemptionCodeAttempts: e.REDEMPTION_CODE_ATTEMPTS ?? fromFile.redemption?.max_attempts ?? DEFAULT_CONFIG.redemptionCodeAttempts,
    dataFile: e.MARKETPLACE_DATA_FILE ?? fromFile.data_file,
    debugEvents: e.DEBUG_EVENTS !== undefined ? e.DEBUG_EVENTS !== '0' : fromFile.debug_events ?? DEFAULT_CONFIG.debugEvents
  };
}
