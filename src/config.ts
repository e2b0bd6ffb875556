import * as dotenv from 'dotenv';
import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigError } from './agent/errors.js';

dotenv.config();

const booleanFlag = z
  .union([z.boolean(), z.string()])
  .transform(v => (typeof v === 'boolean' ? v : !['false', '0', 'no', 'off'].includes(v.trim().toLowerCase())));

const configSchema = z.object({
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  APPROVAL_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
  HUMAN_APPROVAL: booleanFlag.default(true),
  MEMORY_WINDOW: z.coerce.number().int().min(0).default(6),
  TOOL_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  TOOL_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(3),
  DATA_DIR: z.string().min(1).default('./data'),
  QUESTION_BANK: z.string().min(1).default(join(process.cwd(), 'resources', 'questions.json')),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type AppConfig = z.infer<typeof configSchema>;
export type ConfigOverrides = Partial<Record<keyof AppConfig, string | number | boolean | undefined>>;

// Empty strings in .env mean "unset".
function pickEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const key of Object.keys(configSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') out[key] = value;
  }
  return out;
}

export function loadConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const defined = Object.fromEntries(Object.entries(overrides).filter(([, v]) => v !== undefined));
  const parsed = configSchema.safeParse({ ...pickEnv(env), ...defined });
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }
  return parsed.data;
}

export function ensureDataDirs(cfg: AppConfig) {
  for (const dir of [cfg.DATA_DIR, join(cfg.DATA_DIR, 'checkpoints'), join(cfg.DATA_DIR, 'sessions'), join(cfg.DATA_DIR, 'progress')]) {
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  }
}
