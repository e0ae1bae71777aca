import { spawn } from 'node:child_process';
import { z } from 'zod';

import type { AIPlatform, CompletionOptions, PlatformRunner } from './ai-runner.js';
import { applyStopSequences } from './ai-runner.js';
import { logger } from '../ui/logger.js';
import { ModelInvocationError } from '../utils/errors.js';

export interface ClaudeRunnerOptions {
  model?: string;
  cwd?: string;
}

const streamMessageSchema = z
  .object({
    type: z.string(),
    subtype: z.string().optional(),
    result: z.string().optional(),
    is_error: z.boolean().optional(),
    total_cost_usd: z.number().optional(),
  })
  .passthrough();

type StreamMessage = z.infer<typeof streamMessageSchema>;

/**
 * Completes prompts through the Claude Code CLI in single-turn print mode.
 * The CLI has no stop-sequence flag, so stops are applied to the final text.
 */
export class ClaudeRunner implements PlatformRunner {
  readonly platform: AIPlatform = 'claude';
  private readonly options: ClaudeRunnerOptions;

  constructor(options: ClaudeRunnerOptions = {}) {
    this.options = options;
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const text = await this.run(prompt, options.maxTokens);
    return applyStopSequences(text, options.stopSequences);
  }

  private run(prompt: string, maxTokens: number): Promise<string> {
    const cwd = this.options.cwd ?? process.cwd();

    const args = ['--print', '--output-format', 'stream-json', '--verbose', '--max-turns', '1'];
    if (this.options.model) {
      args.push('--model', this.options.model);
    }
    args.push(prompt);

    return new Promise((resolve, reject) => {
      const child = spawn('claude', args, {
        cwd,
        stdio: ['ignore', 'pipe', 'inherit'],
        env: { ...process.env, CLAUDE_CODE_MAX_OUTPUT_TOKENS: String(maxTokens) },
      });

      let result: StreamMessage | undefined;
      let buffer = '';

      const consume = (line: string) => {
        const msg = parseStreamLine(line);
        if (msg?.type === 'result') result = msg;
      };

      child.stdout.on('data', (chunk: Buffer) => {
        buffer += chunk.toString();
        const lines = buffer.split('\n');
        // Keep the last incomplete line in the buffer
        buffer = lines.pop() ?? '';
        for (const line of lines) {
          if (line.trim()) consume(line);
        }
      });

      child.on('close', (code) => {
        if (buffer.trim()) consume(buffer);

        if (code !== 0 && code !== null) {
          reject(new ModelInvocationError('claude', `CLI exited with code ${code}`));
          return;
        }
        const final = result;
        if (!final) {
          reject(new ModelInvocationError('claude', 'CLI produced no result message'));
          return;
        }
        if (final.is_error || final.result === undefined) {
          const detail = final.result || `run ended with ${final.subtype ?? 'an error'}`;
          reject(new ModelInvocationError('claude', detail));
          return;
        }

        if (final.total_cost_usd !== undefined) {
          logger.debug(`Claude cost: $${final.total_cost_usd.toFixed(4)}`);
        }
        resolve(final.result);
      });

      child.on('error', (err) => {
        reject(new ModelInvocationError('claude', `failed to spawn CLI: ${err.message}`, { cause: err }));
      });
    });
  }
}

function parseStreamLine(line: string): StreamMessage | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    // Non-JSON lines (warnings, progress) are not part of the protocol.
    return null;
  }
  const parsed = streamMessageSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}
