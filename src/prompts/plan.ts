import { z } from 'zod';

import { deepFreeze, loadJsonAsset } from '../utils/assets.js';
import type { Domain, JsonObject } from '../planner/types.js';

export interface PlanExample {
  goal: string;
  plan: JsonObject;
}

const exampleSchema = z.object({
  goal: z.string().min(1),
  plan: z.record(z.unknown()),
});

const examplesSchema = z.object({
  general: exampleSchema,
  marketplace: exampleSchema.optional(),
  dashboard: exampleSchema.optional(),
  social: exampleSchema.optional(),
});

type ExampleBook = z.infer<typeof examplesSchema>;

let examples: ExampleBook | undefined;

function getExamples(): ExampleBook {
  examples ??= deepFreeze(loadJsonAsset('plan-examples.json', examplesSchema));
  return examples;
}

/** Worked example for the domain, or the general one when the domain has none. */
export function selectExample(domain: Domain): PlanExample {
  const book = getExamples();
  return book[domain] ?? book.general;
}

export function buildPlanPrompt(goal: string, domain: Domain, example: PlanExample): string {
  return `You are a multi-agent project planner. Given a software goal, return a single JSON object with detailed plans for the planner, coder, and designer agents.

## Required Structure

- goal: the goal, verbatim
- project_type: e.g. "web_application", "mobile_application", "api_service"
- domain: "${domain}"
- planner: ordered "subtasks" (execution order) and "requirements" with "core_features" (array), "tech_stack" (string) and "timeline" (string)
- coder: "tasks" (array), "technical_specs" (object) and "file_structure" (object mapping relative file path to a one-line description)
- designer: "theme" (string), "pages" (array of {"name", "components"}) and "design_system" with "colors" and "typography" objects

## Rules

- Be specific to this goal. Name real features, real files and real screens.
- Do not use placeholder wording such as "to be defined" or "main content".
- Return ONLY the JSON object. No markdown fences, no explanation, no text after the object.

## Example

Goal: ${example.goal}
Output:
${JSON.stringify(example.plan, null, 2)}

## Now Do This

Goal: ${goal}
Output:
`;
}
