import { MalformedPlanError, errorMessage } from '../utils/errors.js';
import { isJsonObject } from './types.js';
import type { PlanDraft } from './types.js';

const FENCE_OPENER = /^```[a-z]*[ \t]*\r?\n?/i;
const TRAILING_FENCE = /\s*```\s*$/;

/**
 * Decodes raw model output into a plan object. Performs no enhancement and
 * no field validation.
 *
 * Recovery is limited to what models commonly append: a surrounding code
 * fence is stripped, and anything after the first complete top-level value is
 * ignored. Leading prose is not skipped.
 */
export function parsePlan(rawText: string): PlanDraft {
  const text = stripLeadingFence(rawText.trim());
  if (!text) {
    throw new MalformedPlanError('Model returned an empty response', rawText);
  }

  const end = findValueEnd(text);
  const candidate = end === -1 ? text : text.slice(0, end);

  let value: unknown;
  try {
    value = JSON.parse(candidate);
  } catch (error) {
    throw new MalformedPlanError(`Model output is not valid JSON: ${errorMessage(error)}`, rawText);
  }

  if (!isJsonObject(value)) {
    throw new MalformedPlanError(`Expected a JSON object but got ${describe(value)}`, rawText);
  }

  return value;
}

// The closing fence is left for findValueEnd to cut off, since a fence can
// also appear inside a JSON string.
function stripLeadingFence(text: string): string {
  const opener = text.match(FENCE_OPENER);
  if (!opener) return text;
  const body = text.slice(opener[0].length).trim();
  return findValueEnd(body) === -1 ? body.replace(TRAILING_FENCE, '') : body;
}

/**
 * Index just past the first balanced object or array at the start of `text`,
 * or -1 when `text` does not start with one or it never closes.
 */
export function findValueEnd(text: string): number {
  if (text[0] !== '{' && text[0] !== '[') return -1;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }

    if (char === '"') inString = true;
    else if (char === '{' || char === '[') depth++;
    else if (char === '}' || char === ']') {
      depth--;
      if (depth === 0) return i + 1;
    }
  }

  return -1;
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return `a ${typeof value}`;
}
