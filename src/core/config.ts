import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';

import { AI_PLATFORM_VALUES } from './ai-runner.js';
import { DEFAULT_PLAN_FILE } from './plan-store.js';
import { fileExists } from '../utils/fs.js';
import { ConfigError, errorMessage } from '../utils/errors.js';

export const CONFIG_FILENAME = 'planwright.config.json';

export const plannerConfigSchema = z
  .object({
    platform: z.enum(AI_PLATFORM_VALUES).default('gemini'),
    model: z.string().min(1).optional(),
    outputFile: z.string().min(1).default(DEFAULT_PLAN_FILE),
    classifyMaxTokens: z.number().int().positive().default(10),
    planMaxTokens: z.number().int().positive().default(4096),
    stopSequences: z.array(z.string()).default([]),
    fillEmptySections: z.boolean().default(true),
  })
  .strict();

export type PlannerConfig = z.infer<typeof plannerConfigSchema>;
export type PlannerConfigInput = z.input<typeof plannerConfigSchema>;

const ENV_KEYS = {
  platform: 'PLANWRIGHT_PLATFORM',
  model: 'PLANWRIGHT_MODEL',
  outputFile: 'PLANWRIGHT_OUTPUT',
} as const;

async function readConfigFile(cwd: string): Promise<Record<string, unknown>> {
  const configPath = join(cwd, CONFIG_FILENAME);
  if (!(await fileExists(configPath))) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Could not read ${CONFIG_FILENAME}: ${errorMessage(error)}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`${CONFIG_FILENAME} must contain a JSON object`);
  }
  return { ...parsed };
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [field, variable] of Object.entries(ENV_KEYS)) {
    const value = env[variable];
    if (value) values[field] = field === 'platform' ? value.toLowerCase() : value;
  }
  return values;
}

function definedOnly(overrides: Partial<PlannerConfigInput>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
}

/**
 * Resolves the planner config. Later sources win:
 * defaults < planwright.config.json < PLANWRIGHT_* env < explicit overrides (CLI flags).
 */
export async function loadPlannerConfig(
  cwd: string,
  options: { env?: NodeJS.ProcessEnv; overrides?: Partial<PlannerConfigInput> } = {},
): Promise<PlannerConfig> {
  const merged = {
    ...(await readConfigFile(cwd)),
    ...readEnv(options.env ?? process.env),
    ...definedOnly(options.overrides ?? {}),
  };

  const result = plannerConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid planner configuration:\n  - ${issues.join('\n  - ')}`);
  }
  return result.data;
}
