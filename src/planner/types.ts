export const DOMAINS = ['marketplace', 'dashboard', 'social', 'general'] as const;

export type Domain = (typeof DOMAINS)[number];

export function isDomain(value: string): value is Domain {
  return DOMAINS.some((d) => d === value);
}

/** A decoded JSON object whose shape has not been checked yet. */
export type JsonObject = { [key: string]: unknown };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Whatever the parser decoded from the model. Only "it is an object" is known. */
export type PlanDraft = JsonObject;

export interface Page {
  name: string;
  components: string[];
}

export interface Requirements {
  core_features: string[];
  tech_stack: string;
  timeline: string;
}

export interface DesignSystem {
  colors: Record<string, string>;
  typography: Record<string, string>;
}

export interface PlannerSection extends JsonObject {
  requirements: JsonObject;
}

/**
 * A plan after field completion. Top-level fields are guaranteed;
 * nested content beyond `planner.requirements` is whatever the model produced.
 */
export interface CompletedPlan extends JsonObject {
  goal: string;
  project_type: string;
  domain: Domain;
  planner: PlannerSection;
  coder: JsonObject;
  designer: JsonObject;
}

export interface Plan extends CompletedPlan {
  generated_at: string;
}

export interface DomainTemplate {
  readonly core_features: readonly string[];
  readonly pages: readonly Readonly<{ name: string; components: readonly string[] }>[];
  readonly file_structure?: Readonly<Record<string, string>>;
}

/** One variant per domain; `general` carries no template. */
export type DomainProfile =
  | { readonly domain: 'marketplace'; readonly template: DomainTemplate }
  | { readonly domain: 'dashboard'; readonly template: DomainTemplate }
  | { readonly domain: 'social'; readonly template: DomainTemplate }
  | { readonly domain: 'general'; readonly template: null };

export type Outcome<T> =
  | { readonly kind: 'ok'; readonly value: T }
  | { readonly kind: 'degraded'; readonly value: T; readonly reason: string };

export function ok<T>(value: T): Outcome<T> {
  return { kind: 'ok', value };
}

export function degraded<T>(value: T, reason: string): Outcome<T> {
  return { kind: 'degraded', value, reason };
}
