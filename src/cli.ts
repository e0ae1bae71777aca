import { Command } from 'commander';

import { getPackageInfo } from './utils/package-info.js';

const pkg = getPackageInfo();

export const program = new Command()
  .name('planwright')
  .description(pkg.description)
  .version(pkg.version)
  .argument('[goal]', 'Software goal to plan (prompts for one if omitted)')
  .option('-o, --out <file>', 'Where to write the plan (.json, .yaml or .yml)')
  .option('-p, --platform <platform>', 'Model platform: gemini or claude')
  .option('-m, --model <model>', 'Model name for the selected platform')
  .option('--keep-empty', 'Leave empty pages/file_structure from the model as they are')
  .option('-y, --yes', 'Overwrite an existing plan file without asking')
  .action(
    async (
      goal: string | undefined,
      options: { out?: string; platform?: string; model?: string; keepEmpty?: boolean; yes?: boolean },
    ) => {
      const { planCommand } = await import('./commands/plan.js');
      await planCommand({ goal, ...options });
    },
  );

program
  .command('classify')
  .description('Show which domain a goal is classified into')
  .argument('<goal>', 'Software goal to classify')
  .option('-p, --platform <platform>', 'Model platform: gemini or claude')
  .option('-m, --model <model>', 'Model name for the selected platform')
  .action(async (goal: string, options: { platform?: string; model?: string }) => {
    const { classifyCommand } = await import('./commands/classify.js');
    await classifyCommand(goal, options);
  });

program
  .command('validate')
  .description('Check that a saved plan has the fields downstream agents need')
  .argument('[file]', 'Plan file to check', 'plan.json')
  .action(async (file: string) => {
    const { validateCommand } = await import('./commands/validate.js');
    await validateCommand(file);
  });
