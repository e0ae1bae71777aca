import { loadPlannerConfig } from '../core/config.js';
import { assertPlatformAvailable, createRunner } from '../core/runner-factory.js';
import { DomainClassifier } from '../planner/classifier.js';
import { logger } from '../ui/logger.js';
import { configOverrides, withProgress } from './plan.js';
import type { PlanCommandOptions } from './plan.js';

export async function classifyCommand(
  goal: string,
  options: Pick<PlanCommandOptions, 'platform' | 'model'>,
): Promise<void> {
  const cwd = process.cwd();
  const config = await loadPlannerConfig(cwd, { overrides: configOverrides(options) });
  assertPlatformAvailable(config.platform);

  const runner = createRunner(config.platform, { model: config.model, cwd });
  const classifier = new DomainClassifier(withProgress(runner), {
    maxTokens: config.classifyMaxTokens,
  });

  const outcome = await classifier.evaluate(goal);
  if (outcome.kind === 'degraded') {
    logger.warn(`${outcome.value} (default)`);
  } else {
    logger.success(outcome.value);
  }
}
