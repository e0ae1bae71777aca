import { GoogleGenAI } from '@google/genai';

import type { AIPlatform, CompletionOptions, PlatformRunner } from './ai-runner.js';
import { ModelInvocationError, errorMessage } from '../utils/errors.js';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';

export interface GeminiRunnerOptions {
  apiKey: string;
  model?: string;
}

export class GeminiRunner implements PlatformRunner {
  readonly platform: AIPlatform = 'gemini';
  readonly model: string;
  private readonly client: GoogleGenAI;

  constructor(options: GeminiRunnerOptions) {
    this.model = options.model ?? DEFAULT_GEMINI_MODEL;
    this.client = new GoogleGenAI({ apiKey: options.apiKey });
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const stopSequences = options.stopSequences?.length ? [...options.stopSequences] : undefined;

    let text: string | undefined;
    try {
      const response = await this.client.models.generateContent({
        model: this.model,
        contents: prompt,
        config: {
          maxOutputTokens: options.maxTokens,
          stopSequences,
        },
      });
      text = response.text;
    } catch (error) {
      throw new ModelInvocationError('gemini', errorMessage(error), { cause: error });
    }

    if (text === undefined) {
      throw new ModelInvocationError('gemini', 'response contained no text');
    }
    return text;
  }
}
