import { copyFileStructure, copyPages, templateFor } from './catalog.js';
import { isJsonObject } from './types.js';
import type { CompletedPlan, Domain, JsonObject, PlanDraft, PlannerSection } from './types.js';

export const DEFAULT_PROJECT_TYPE = 'web_application';

export interface CompletionOptions {
  /**
   * Treat an empty `pages` array or `file_structure` object as missing.
   * When false, only an absent (or wrongly typed) value is filled.
   */
  fillEmpty: boolean;
}

export const DEFAULT_COMPLETION_OPTIONS: CompletionOptions = { fillEmpty: true };

/**
 * Guarantees the top-level plan fields, whatever produced the plan. Runs last.
 *
 * Sections that are missing or not objects become `{}`; `domain` is always
 * overwritten. Template pages and file structure fill gaps only. Subtasks,
 * tasks, theme and the rest are never synthesized. Idempotent.
 */
export function completePlan(
  plan: PlanDraft,
  goal: string,
  domain: Domain,
  options: CompletionOptions = DEFAULT_COMPLETION_OPTIONS,
): CompletedPlan {
  const template = templateFor(domain);

  const planner = sectionOf(plan, 'planner');
  const requirements = isJsonObject(planner.requirements) ? planner.requirements : {};
  const completedPlanner: PlannerSection = Object.assign(planner, { requirements });

  const coder = sectionOf(plan, 'coder');
  if (template && isMissing(coder.file_structure, 'object', options)) {
    const fileStructure = copyFileStructure(template);
    if (fileStructure) coder.file_structure = fileStructure;
  }

  const designer = sectionOf(plan, 'designer');
  if (template && isMissing(designer.pages, 'array', options)) {
    designer.pages = copyPages(template);
  }

  return Object.assign(plan, {
    goal: nonEmptyString(plan.goal) ?? goal,
    project_type: nonEmptyString(plan.project_type) ?? DEFAULT_PROJECT_TYPE,
    domain,
    planner: completedPlanner,
    coder,
    designer,
  });
}

function sectionOf(plan: PlanDraft, key: 'planner' | 'coder' | 'designer'): JsonObject {
  const value = plan[key];
  return isJsonObject(value) ? value : {};
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value : undefined;
}

function isMissing(value: unknown, shape: 'array' | 'object', options: CompletionOptions): boolean {
  if (shape === 'array') {
    if (!Array.isArray(value)) return true;
    return options.fillEmpty && value.length === 0;
  }
  if (!isJsonObject(value)) return true;
  return options.fillEmpty && Object.keys(value).length === 0;
}
