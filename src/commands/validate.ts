import { resolve } from 'node:path';

import { DEFAULT_PLAN_FILE, cleanSubtasks, loadPlan } from '../core/plan-store.js';
import { logger } from '../ui/logger.js';

export async function validateCommand(file: string = DEFAULT_PLAN_FILE): Promise<void> {
  const path = resolve(process.cwd(), file);
  const plan = await loadPlan(path);

  logger.success(`${file} is a valid plan`);
  logger.info(`Goal:   ${plan.goal}`);
  if (typeof plan.domain === 'string') {
    logger.info(`Domain: ${plan.domain}`);
  }

  const subtasks = cleanSubtasks(plan.planner.subtasks);
  const dropped = plan.planner.subtasks.length - subtasks.length;
  console.log();
  logger.numbered(subtasks);
  if (dropped > 0) {
    logger.dim(`  (${dropped} trailing entr${dropped === 1 ? 'y' : 'ies'} ignored as model chatter)`);
  }
}
