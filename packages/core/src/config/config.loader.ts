import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import yaml from 'js-yaml';
import { z } from 'zod';
import type { TickertapeConfig } from '@tickertape/shared';
import { DEFAULT_CONFIG } from './config.defaults.js';
import { isRecord } from '../utils/guards.js';

const TICKERTAPE_DIR = path.join(os.homedir(), '.tickertape');
const CONFIG_PATH = path.join(TICKERTAPE_DIR, 'config.yaml');

const providerSchema = z.discriminatedUnion('name', [
  z.object({
    name: z.literal('openai'),
    model: z.string().min(1, 'must be a non-empty string'),
    base_url: z.string().url().optional(),
  }),
  z.object({
    name: z.literal('ollama'),
    model: z.string().min(1, 'must be a non-empty string'),
    host: z.string().min(1, 'must be a non-empty string'),
    port: z.number().int().min(1).max(65535, 'must be a valid port number (1-65535)'),
  }),
]);

const configSchema = z.object({
  provider: providerSchema,
  agents: z.object({
    max_history_messages: z.number().int().min(2, 'must be >= 2'),
    max_iterations: z.number().int().min(1, 'must be >= 1'),
  }),
  task: z.object({
    max_retries: z.number().int().min(0, 'must be >= 0'),
  }),
  sources: z.object({
    coingecko_api_key: z.string().optional(),
    bitquery_api_key: z.string().optional(),
    llamafeed_base_url: z.string().url(),
    request_timeout_ms: z.number().int().min(100, 'must be >= 100'),
  }),
  logs: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  }),
});

function deepMerge(base: unknown, override: unknown): unknown {
  if (!isRecord(base) || !isRecord(override)) {
    return override === undefined || override === null ? base : override;
  }
  const result: Record<string, unknown> = { ...base };
  for (const [key, overrideVal] of Object.entries(override)) {
    result[key] = deepMerge(base[key], overrideVal);
  }
  return result;
}

/** Environment variables win over the file. Empty values count as unset. */
function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const sources: Record<string, string> = {};
  if (env.COINGECKO_API_KEY) sources.coingecko_api_key = env.COINGECKO_API_KEY;
  if (env.BITQUERY_API_KEY) sources.bitquery_api_key = env.BITQUERY_API_KEY;

  const overrides: Record<string, unknown> = { sources };
  if (env.TICKERTAPE_LOG_LEVEL) {
    overrides.logs = { level: env.TICKERTAPE_LOG_LEVEL };
  }
  return overrides;
}

export function validateConfig(candidate: unknown): TickertapeConfig {
  const parsed = configSchema.safeParse(candidate);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
    throw new Error(`Config validation failed: ${problems.join('; ')}`);
  }
  return parsed.data;
}

export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<TickertapeConfig> {
  // Ensure ~/.tickertape/ exists
  if (!fs.existsSync(TICKERTAPE_DIR)) {
    fs.mkdirSync(TICKERTAPE_DIR, { recursive: true });
  }

  let userConfig: unknown = {};

  if (fs.existsSync(CONFIG_PATH)) {
    const raw = fs.readFileSync(CONFIG_PATH, 'utf8');
    const parsed = yaml.load(raw);
    if (isRecord(parsed)) {
      userConfig = parsed;
    }
  } else {
    fs.writeFileSync(CONFIG_PATH, yaml.dump(DEFAULT_CONFIG), 'utf8');
    process.stderr.write(`[tickertape] Created default config at ${CONFIG_PATH}\n`);
  }

  const merged = deepMerge(deepMerge(DEFAULT_CONFIG, userConfig), envOverrides(env));
  return validateConfig(merged);
}

export { TICKERTAPE_DIR, CONFIG_PATH };
