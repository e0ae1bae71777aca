import type { ModelRunner } from '../core/ai-runner.js';
import { buildClassifyPrompt } from '../prompts/classify.js';
import { logger } from '../ui/logger.js';
import type { ProgressReporter } from '../ui/logger.js';
import { errorMessage } from '../utils/errors.js';
import { degraded, isDomain, ok } from './types.js';
import type { Domain, Outcome } from './types.js';

export const DEFAULT_DOMAIN: Domain = 'general';

export const DEFAULT_CLASSIFY_MAX_TOKENS = 10;

export interface DomainClassifierOptions {
  maxTokens?: number;
  reporter?: ProgressReporter;
}

/**
 * Maps a goal to one of the known domains with a single short model call.
 *
 * The answer is trimmed, lower-cased and checked by exact membership. Anything
 * else, including a failed call, resolves to `general`. Never rejects.
 */
export class DomainClassifier {
  private readonly maxTokens: number;
  private readonly reporter: ProgressReporter;

  constructor(
    private readonly runner: ModelRunner,
    options: DomainClassifierOptions = {},
  ) {
    this.maxTokens = options.maxTokens ?? DEFAULT_CLASSIFY_MAX_TOKENS;
    this.reporter = options.reporter ?? logger;
  }

  async classify(goal: string): Promise<Domain> {
    const outcome = await this.evaluate(goal);
    return outcome.value;
  }

  async evaluate(goal: string): Promise<Outcome<Domain>> {
    this.reporter.info('Classifying goal domain...');

    let raw: string;
    try {
      raw = await this.runner.complete(buildClassifyPrompt(goal), { maxTokens: this.maxTokens });
    } catch (error) {
      return this.fallBack(`classification call failed (${errorMessage(error)})`);
    }

    const answer = raw.trim().toLowerCase();
    if (!isDomain(answer)) {
      return this.fallBack(`model answered ${JSON.stringify(raw.trim())}, which is not a known domain`);
    }

    this.reporter.info(`Domain: ${answer}`);
    return ok(answer);
  }

  private fallBack(reason: string): Outcome<Domain> {
    this.reporter.warn(`Domain classification defaulted to "${DEFAULT_DOMAIN}": ${reason}`);
    return degraded(DEFAULT_DOMAIN, reason);
  }
}
