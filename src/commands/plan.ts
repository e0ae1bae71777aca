import { resolve } from 'node:path';

import { AI_PLATFORM_VALUES, isAIPlatform } from '../core/ai-runner.js';
import type { AIPlatform, ModelRunner, PlatformRunner } from '../core/ai-runner.js';
import { loadPlannerConfig } from '../core/config.js';
import type { PlannerConfigInput } from '../core/config.js';
import { FilePlanStore } from '../core/plan-store.js';
import { assertPlatformAvailable, createRunner } from '../core/runner-factory.js';
import { PlanOrchestrator } from '../planner/orchestrator.js';
import { logger } from '../ui/logger.js';
import { confirmPrompt, inputPrompt } from '../ui/prompts.js';
import { withSpinner } from '../ui/spinner.js';
import { ConfigError } from '../utils/errors.js';
import { fileExists } from '../utils/fs.js';

export interface PlanCommandOptions {
  goal?: string;
  out?: string;
  platform?: string;
  model?: string;
  keepEmpty?: boolean;
  yes?: boolean;
}

/** Shows a spinner for every model call made through the runner. */
export function withProgress(runner: PlatformRunner): ModelRunner {
  return {
    complete: (prompt, options) =>
      withSpinner(
        `Waiting for ${runner.platform}...`,
        () => runner.complete(prompt, options),
        (text) => `${runner.platform} responded (${text.length} chars)`,
      ),
  };
}

export function configOverrides(options: PlanCommandOptions): Partial<PlannerConfigInput> {
  return {
    outputFile: options.out,
    model: options.model,
    fillEmptySections: options.keepEmpty ? false : undefined,
    platform: options.platform === undefined ? undefined : parsePlatformFlag(options.platform),
  };
}

function parsePlatformFlag(value: string): AIPlatform {
  const platform = value.toLowerCase();
  if (isAIPlatform(platform)) return platform;
  throw new ConfigError(
    `Unknown platform "${value}". Expected one of: ${AI_PLATFORM_VALUES.join(', ')}`,
  );
}

export async function planCommand(options: PlanCommandOptions): Promise<void> {
  const cwd = process.cwd();
  const config = await loadPlannerConfig(cwd, { overrides: configOverrides(options) });

  logger.header('Planwright');

  let goal = options.goal;
  if (!goal) {
    goal = await inputPrompt('Describe the software you want to build:');
  }

  if (!goal.trim()) {
    logger.error('No goal provided. Aborting.');
    return;
  }

  assertPlatformAvailable(config.platform);

  const destination = resolve(cwd, config.outputFile);
  if (!options.yes && (await fileExists(destination))) {
    const proceed = await confirmPrompt(`${config.outputFile} already exists. Overwrite it?`, false);
    if (!proceed) {
      logger.info('Aborted.');
      return;
    }
  }

  const runner = createRunner(config.platform, { model: config.model, cwd });
  const orchestrator = new PlanOrchestrator({
    runner: withProgress(runner),
    store: new FilePlanStore(),
    options: {
      classifyMaxTokens: config.classifyMaxTokens,
      planMaxTokens: config.planMaxTokens,
      stopSequences: config.stopSequences,
      fillEmpty: config.fillEmptySections,
    },
  });

  const result = await orchestrator.run(goal.trim(), destination);

  console.log();
  if (result.subtasks.length > 0) {
    logger.info(`Subtasks (${result.plan.domain}):`);
    logger.numbered(result.subtasks);
  } else {
    logger.warn('The plan has no subtasks.');
  }
  console.log();

  if (result.provenance === 'fallback') {
    logger.warn('This is a template plan: the model output could not be used. Review it before handing it off.');
  } else if (result.enhanced) {
    logger.dim(`Generic sections were replaced with ${result.plan.domain} template content.`);
  }
}
