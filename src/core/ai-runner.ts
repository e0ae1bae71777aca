export type AIPlatform = 'gemini' | 'claude';

export const AI_PLATFORM_VALUES = ['gemini', 'claude'] as const satisfies readonly AIPlatform[];

export interface CompletionOptions {
  /** Upper bound on generated output, in tokens. */
  maxTokens: number;
  stopSequences?: readonly string[];
}

/**
 * Anything that maps a prompt to raw generated text.
 * Implementations reject with `ModelInvocationError` on transport or provider failure.
 */
export interface ModelRunner {
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

export interface PlatformRunner extends ModelRunner {
  readonly platform: AIPlatform;
}

export interface RunnerSettings {
  model?: string;
  cwd?: string;
  apiKey?: string;
}

export function isAIPlatform(value: string): value is AIPlatform {
  return AI_PLATFORM_VALUES.some((p) => p === value);
}

/** Truncates `text` at the earliest stop sequence, for backends that cannot stop server-side. */
export function applyStopSequences(text: string, stopSequences?: readonly string[]): string {
  let cut = text.length;
  for (const stop of stopSequences ?? []) {
    if (!stop) continue;
    const index = text.indexOf(stop);
    if (index !== -1 && index < cut) cut = index;
  }
  return text.slice(0, cut);
}
