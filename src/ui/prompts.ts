import { confirm, input } from '@inquirer/prompts';

import { UserCancelledError } from '../utils/errors.js';

// Ctrl+C inside an inquirer prompt rejects with ExitPromptError.
function isPromptExit(error: unknown): boolean {
  return error instanceof Error && error.name === 'ExitPromptError';
}

export async function confirmPrompt(message: string, defaultValue = true): Promise<boolean> {
  try {
    return await confirm({ message, default: defaultValue });
  } catch (error) {
    if (isPromptExit(error)) throw new UserCancelledError();
    throw error;
  }
}

export async function inputPrompt(message: string, defaultValue?: string): Promise<string> {
  try {
    return await input({ message, default: defaultValue });
  } catch (error) {
    if (isPromptExit(error)) throw new UserCancelledError();
    throw error;
  }
}
