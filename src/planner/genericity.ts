/**
 * Phrases that only show up when a model filled a field without committing to
 * anything. Matched case-insensitively against the whole serialized plan, so
 * a hit anywhere (goal text included) counts. False positives only cost an
 * extra enhancement pass.
 */
export const PLACEHOLDER_PHRASES: readonly string[] = [
  'to be defined based on goal',
  'to be determined',
  'modern web technologies',
  'main content',
  'content area',
  'lorem ipsum',
  'placeholder',
  'tbd',
];

export function findPlaceholderPhrases(plan: unknown): string[] {
  const text = (JSON.stringify(plan) ?? '').toLowerCase();
  return PLACEHOLDER_PHRASES.filter((phrase) => text.includes(phrase));
}

export function isGeneric(plan: unknown): boolean {
  return findPlaceholderPhrases(plan).length > 0;
}
