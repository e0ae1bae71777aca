export class UserCancelledError extends Error {
  constructor(message = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancelledError';
  }
}

export class MalformedPlanError extends Error {
  readonly rawText: string;

  constructor(message: string, rawText: string) {
    super(message);
    this.name = 'MalformedPlanError';
    this.rawText = rawText;
  }
}

export class ModelInvocationError extends Error {
  readonly platform: string;

  constructor(platform: string, message: string, options?: { cause?: unknown }) {
    super(`${platform}: ${message}`, options);
    this.name = 'ModelInvocationError';
    this.platform = platform;
  }
}

export class PersistenceError extends Error {
  readonly destination: string;

  constructor(destination: string, message: string, options?: { cause?: unknown }) {
    super(`Could not save plan to ${destination}: ${message}`, options);
    this.name = 'PersistenceError';
    this.destination = destination;
  }
}

export class PlanValidationError extends Error {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid plan in ${source}:\n  - ${issues.join('\n  - ')}`);
    this.name = 'PlanValidationError';
    this.issues = issues;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class MissingApiKeyError extends Error {
  constructor(
    message = 'No Gemini API key found. Set GEMINI_API_KEY (or GOOGLE_API_KEY) in your environment.',
  ) {
    super(message);
    this.name = 'MissingApiKeyError';
  }
}

const PLATFORM_INSTALL_INSTRUCTIONS: Record<string, string> = {
  claude: 'Install Claude Code: npm install -g @anthropic-ai/claude-code',
};

export class PlatformCLINotFoundError extends Error {
  readonly platform: string;
  readonly binary: string;

  constructor(platform: string, binary: string) {
    const instructions = PLATFORM_INSTALL_INSTRUCTIONS[platform] ?? `Install the ${platform} CLI`;
    super(`${binary} CLI not found in PATH. ${instructions}`);
    this.name = 'PlatformCLINotFoundError';
    this.platform = platform;
    this.binary = binary;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
