import { execFileSync } from 'node:child_process';

import type { AIPlatform, PlatformRunner, RunnerSettings } from './ai-runner.js';
import { ClaudeRunner } from './claude-runner.js';
import { GeminiRunner } from './gemini-runner.js';
import { MissingApiKeyError, PlatformCLINotFoundError } from '../utils/errors.js';

const CLAUDE_BINARY = 'claude';

export function resolveGeminiApiKey(env: NodeJS.ProcessEnv = process.env): string | undefined {
  return env.GEMINI_API_KEY || env.GOOGLE_API_KEY || undefined;
}

export function createRunner(platform: AIPlatform, settings: RunnerSettings = {}): PlatformRunner {
  switch (platform) {
    case 'gemini': {
      const apiKey = settings.apiKey ?? resolveGeminiApiKey();
      if (!apiKey) throw new MissingApiKeyError();
      return new GeminiRunner({ apiKey, model: settings.model });
    }
    case 'claude':
      return new ClaudeRunner({ model: settings.model, cwd: settings.cwd });
    default: {
      const _exhaustive: never = platform;
      throw new Error(`Unknown AI platform: ${String(_exhaustive)}`);
    }
  }
}

/** Fails fast, before any model call, when the platform cannot be used. */
export function assertPlatformAvailable(
  platform: AIPlatform,
  env: NodeJS.ProcessEnv = process.env,
): void {
  switch (platform) {
    case 'gemini':
      if (!resolveGeminiApiKey(env)) throw new MissingApiKeyError();
      return;
    case 'claude': {
      const cmd = process.platform === 'win32' ? 'where' : 'which';
      try {
        execFileSync(cmd, [CLAUDE_BINARY], { stdio: 'ignore' });
      } catch {
        throw new PlatformCLINotFoundError(platform, CLAUDE_BINARY);
      }
      return;
    }
    default: {
      const _exhaustive: never = platform;
      throw new Error(`Unknown AI platform: ${String(_exhaustive)}`);
    }
  }
}
