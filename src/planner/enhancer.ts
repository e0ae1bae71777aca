import { copyFeatures, copyFileStructure, copyPages, templateFor } from './catalog.js';
import { isJsonObject } from './types.js';
import type { Domain, PlanDraft } from './types.js';

/**
 * Replaces shallow plan content with the domain template, in place.
 *
 * Each field is overwritten only where the model already produced the
 * surrounding structure; creating missing structure is the completer's job.
 * No-op for domains without a template.
 */
export function enhancePlan(plan: PlanDraft, domain: Domain): PlanDraft {
  const template = templateFor(domain);
  if (!template) return plan;

  const { planner, coder, designer } = plan;

  if (isJsonObject(planner) && isJsonObject(planner.requirements)) {
    planner.requirements.core_features = copyFeatures(template);
  }

  if (isJsonObject(designer) && 'pages' in designer) {
    designer.pages = copyPages(template);
  }

  const fileStructure = copyFileStructure(template);
  if (fileStructure && isJsonObject(coder) && 'file_structure' in coder) {
    coder.file_structure = fileStructure;
  }

  return plan;
}
