import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { z } from 'zod';

const __dirname = dirname(fileURLToPath(import.meta.url));
// Same depth from src/utils and dist/utils.
const templatesDir = resolve(__dirname, '../../templates');

export function templatePath(name: string): string {
  return resolve(templatesDir, name);
}

/**
 * Reads a bundled JSON asset from `templates/` and validates it.
 * Assets ship with the package, so a bad one is a packaging bug and throws.
 */
export function loadJsonAsset<T>(name: string, schema: z.ZodType<T>): T {
  const raw = readFileSync(templatePath(name), 'utf-8');
  const parsed = schema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Bundled asset ${name} is invalid: ${parsed.error.message}`);
  }
  return parsed.data;
}

/** Recursively freezes a value loaded once at startup. */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
