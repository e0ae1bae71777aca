import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';

import type { Plan } from '../planner/types.js';
import { fileExists, isYamlPath } from '../utils/fs.js';
import { PersistenceError, PlanValidationError, errorMessage } from '../utils/errors.js';

export const DEFAULT_PLAN_FILE = 'plan.json';

export interface SaveResult {
  path: string;
  status: 'created' | 'modified';
}

export interface PlanStore {
  save(plan: Plan, destination: string): Promise<SaveResult>;
}

const TOP_LEVEL_ORDER = [
  'goal',
  'project_type',
  'domain',
  'planner',
  'coder',
  'designer',
  'generated_at',
] as const;

/** Copies `plan` with the known top-level fields first, so saved plans diff cleanly. */
export function orderPlanFields(plan: Plan): Record<string, unknown> {
  const ordered: Record<string, unknown> = {};
  for (const key of TOP_LEVEL_ORDER) {
    ordered[key] = plan[key];
  }
  for (const [key, value] of Object.entries(plan)) {
    if (!(key in ordered)) ordered[key] = value;
  }
  return ordered;
}

export function serializePlan(plan: Plan, destination: string): string {
  const ordered = orderPlanFields(plan);
  return isYamlPath(destination)
    ? stringifyYaml(ordered)
    : JSON.stringify(ordered, null, 2) + '\n';
}

/** Writes plans as pretty JSON, or YAML when the destination ends in .yaml/.yml. */
export class FilePlanStore implements PlanStore {
  async save(plan: Plan, destination: string): Promise<SaveResult> {
    try {
      const existed = await fileExists(destination);
      await mkdir(dirname(destination), { recursive: true });
      await writeFile(destination, serializePlan(plan, destination), 'utf-8');
      return { path: destination, status: existed ? 'modified' : 'created' };
    } catch (error) {
      throw new PersistenceError(destination, errorMessage(error), { cause: error });
    }
  }
}

// ── Read path ───────────────────────────────────────────────────────────────

const storedPlanSchema = z
  .object({
    goal: z.string(),
    planner: z.object({ subtasks: z.array(z.string()) }).passthrough(),
    coder: z.record(z.unknown()),
  })
  .passthrough();

export type StoredPlan = z.infer<typeof storedPlanSchema>;

/**
 * Loads a persisted plan for downstream agents and checks the fields they
 * rely on: `goal`, `planner.subtasks` and `coder`.
 */
export async function loadPlan(path: string): Promise<StoredPlan> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new PlanValidationError(path, [`cannot read file (${errorMessage(error)})`]);
  }

  let parsed: unknown;
  try {
    parsed = isYamlPath(path) ? parseYaml(raw) : JSON.parse(raw);
  } catch (error) {
    throw new PlanValidationError(path, [`not valid ${isYamlPath(path) ? 'YAML' : 'JSON'} (${errorMessage(error)})`]);
  }

  const result = storedPlanSchema.safeParse(parsed);
  if (!result.success) {
    throw new PlanValidationError(
      path,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}

/**
 * Text that language models tend to append after a task list (quiz prompts,
 * tool suggestions, chat-template tokens). Everything from the first subtask
 * containing one of these is dropped.
 */
export const SUBTASK_NOISE_MARKERS: readonly string[] = [
  '<|question_end|>',
  '<|endoftext|>',
  'question 1',
  'trello',
  'asana',
  'microsoft project',
];

export function cleanSubtasks(subtasks: readonly string[]): string[] {
  const cleaned: string[] = [];
  for (const task of subtasks) {
    const lower = task.toLowerCase();
    if (SUBTASK_NOISE_MARKERS.some((marker) => lower.includes(marker))) break;
    cleaned.push(task);
  }
  return cleaned;
}
