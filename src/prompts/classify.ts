import { DOMAINS } from '../planner/types.js';
import type { Domain } from '../planner/types.js';

const DOMAIN_DESCRIPTIONS: Record<Domain, string> = {
  marketplace: 'buying and selling goods or services between users, listings, carts, payments',
  dashboard: 'analytics, reporting, monitoring or admin views over business data',
  social: 'user profiles, feeds, posts, messaging or community interaction',
  general: 'anything that does not clearly fit the domains above',
};

/**
 * Closed-set classification prompt. The model must answer with a single
 * lowercase domain token so the answer can be checked by exact membership.
 */
export function buildClassifyPrompt(goal: string): string {
  const domainList = DOMAINS.map((d) => `- ${d}: ${DOMAIN_DESCRIPTIONS[d]}`).join('\n');

  return `Classify the following software project goal into exactly one domain.

## Domains
${domainList}

Respond with ONLY the domain name, in lowercase, exactly as written above.
No punctuation, no quotes, no explanation.

Goal: ${goal}
Domain:`;
}
