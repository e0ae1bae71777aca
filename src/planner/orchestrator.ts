import type { ModelRunner } from '../core/ai-runner.js';
import { DEFAULT_PLAN_FILE } from '../core/plan-store.js';
import type { PlanStore } from '../core/plan-store.js';
import { buildPlanPrompt, selectExample } from '../prompts/plan.js';
import { logger } from '../ui/logger.js';
import type { ProgressReporter } from '../ui/logger.js';
import { MalformedPlanError, errorMessage } from '../utils/errors.js';
import { DEFAULT_CLASSIFY_MAX_TOKENS, DomainClassifier } from './classifier.js';
import { completePlan } from './completer.js';
import { enhancePlan } from './enhancer.js';
import { buildFallbackPlan } from './fallback.js';
import { findPlaceholderPhrases } from './genericity.js';
import { parsePlan } from './parser.js';
import { degraded, ok } from './types.js';
import type { Domain, Outcome, Plan, PlanDraft } from './types.js';

export type PlanningState =
  | 'classifying'
  | 'prompting'
  | 'parse-ok'
  | 'parse-failed'
  | 'enhancing'
  | 'completing'
  | 'persisted';

export type PlanProvenance = 'model' | 'fallback';

export interface PlanResult {
  plan: Plan;
  /** `planner.subtasks` in execution order; empty when the plan has none. */
  subtasks: string[];
  provenance: PlanProvenance;
  domainDefaulted: boolean;
  /** True when the plan was flagged generic and the domain template applied. */
  enhanced: boolean;
  placeholders: string[];
  states: PlanningState[];
  destination: string;
}

export interface OrchestratorOptions {
  classifyMaxTokens: number;
  planMaxTokens: number;
  stopSequences: readonly string[];
  fillEmpty: boolean;
}

export const DEFAULT_ORCHESTRATOR_OPTIONS: OrchestratorOptions = {
  classifyMaxTokens: DEFAULT_CLASSIFY_MAX_TOKENS,
  planMaxTokens: 4096,
  stopSequences: [],
  fillEmpty: true,
};

export interface PlanOrchestratorDeps {
  runner: ModelRunner;
  store: PlanStore;
  reporter?: ProgressReporter;
  clock?: () => Date;
  options?: Partial<OrchestratorOptions>;
}

const RAW_OUTPUT_PREVIEW = 500;

/**
 * Runs one goal through classify → prompt → parse-or-fallback → enhance →
 * complete → persist. Model failures degrade to the fallback plan; only
 * persistence errors reach the caller. There is no retry.
 */
export class PlanOrchestrator {
  private readonly runner: ModelRunner;
  private readonly store: PlanStore;
  private readonly reporter: ProgressReporter;
  private readonly clock: () => Date;
  private readonly options: OrchestratorOptions;
  private readonly classifier: DomainClassifier;

  constructor(deps: PlanOrchestratorDeps) {
    this.runner = deps.runner;
    this.store = deps.store;
    this.reporter = deps.reporter ?? logger;
    this.clock = deps.clock ?? (() => new Date());
    this.options = { ...DEFAULT_ORCHESTRATOR_OPTIONS, ...deps.options };
    this.classifier = new DomainClassifier(this.runner, {
      maxTokens: this.options.classifyMaxTokens,
      reporter: this.reporter,
    });
  }

  async plan(goal: string, destination: string = DEFAULT_PLAN_FILE): Promise<string[]> {
    const result = await this.run(goal, destination);
    return result.subtasks;
  }

  async run(goal: string, destination: string = DEFAULT_PLAN_FILE): Promise<PlanResult> {
    const submittedAt = this.clock();
    const states: PlanningState[] = [];
    const enter = (state: PlanningState) => {
      states.push(state);
      this.reporter.debug(`planner state: ${state}`);
    };

    enter('classifying');
    const domainOutcome = await this.classifier.evaluate(goal);
    const domain = domainOutcome.value;

    enter('prompting');
    const drafted = await this.draftPlan(goal, domain);

    const draft = drafted.value;
    let placeholders: string[] = [];
    let enhanced = false;

    if (drafted.kind === 'ok') {
      enter('parse-ok');
      enter('enhancing');
      placeholders = findPlaceholderPhrases(draft);
      if (placeholders.length > 0) {
        this.reporter.info(
          `Plan looks generic (${placeholders.map((p) => `"${p}"`).join(', ')}); applying ${domain} template`,
        );
        enhancePlan(draft, domain);
        enhanced = domain !== 'general';
      }
    } else {
      enter('parse-failed');
      this.reporter.warn(drafted.reason);
      this.reporter.warn(`Using fallback ${domain} template plan instead of model output`);
    }

    enter('completing');
    const completed = completePlan(draft, goal, domain, { fillEmpty: this.options.fillEmpty });

    const plan: Plan = Object.assign(completed, {
      generated_at: this.finalizedAt(submittedAt).toISOString(),
    });
    const saved = await this.store.save(plan, destination);
    enter('persisted');
    this.reporter.success(
      saved.status === 'modified'
        ? `Plan saved to ${saved.path} (replaced the existing file)`
        : `Plan saved to ${saved.path}`,
    );

    return {
      plan,
      subtasks: subtasksOf(plan),
      provenance: drafted.kind === 'ok' ? 'model' : 'fallback',
      domainDefaulted: domainOutcome.kind === 'degraded',
      enhanced,
      placeholders,
      states,
      destination: saved.path,
    };
  }

  /** Model plan when the call and decode succeed; otherwise the fallback plan, degraded. */
  private async draftPlan(goal: string, domain: Domain): Promise<Outcome<PlanDraft>> {
    const prompt = buildPlanPrompt(goal, domain, selectExample(domain));
    this.reporter.info(`Requesting ${domain} plan from model...`);

    let raw: string;
    try {
      raw = await this.runner.complete(prompt, {
        maxTokens: this.options.planMaxTokens,
        stopSequences: this.options.stopSequences,
      });
    } catch (error) {
      return degraded(buildFallbackPlan(goal, domain), `Planning call failed: ${errorMessage(error)}`);
    }

    try {
      return ok(parsePlan(raw));
    } catch (error) {
      if (!(error instanceof MalformedPlanError)) throw error;
      this.reporter.debug(`Raw model output:\n${raw.slice(0, RAW_OUTPUT_PREVIEW)}`);
      return degraded(
        buildFallbackPlan(goal, domain),
        `Model output could not be parsed: ${error.message}`,
      );
    }
  }

  // generated_at must sort after submission even on a clock that has not ticked.
  private finalizedAt(submittedAt: Date): Date {
    const now = this.clock();
    return now.getTime() > submittedAt.getTime() ? now : new Date(submittedAt.getTime() + 1);
  }
}

function subtasksOf(plan: Plan): string[] {
  const subtasks = plan.planner.subtasks;
  if (!Array.isArray(subtasks)) return [];
  return subtasks.filter((task): task is string => typeof task === 'string');
}
