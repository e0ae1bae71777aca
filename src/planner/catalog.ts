import { z } from 'zod';

import { deepFreeze, loadJsonAsset } from '../utils/assets.js';
import type { Domain, DomainProfile, DomainTemplate, Page } from './types.js';

const pageSchema = z.object({
  name: z.string().min(1),
  components: z.array(z.string()),
});

const domainTemplateSchema = z.object({
  core_features: z.array(z.string()).min(1),
  pages: z.array(pageSchema).min(1),
  file_structure: z.record(z.string()).optional(),
});

const catalogSchema = z
  .object({
    marketplace: domainTemplateSchema,
    dashboard: domainTemplateSchema,
    social: domainTemplateSchema,
  })
  .strict();

type TemplateCatalog = Readonly<Record<Exclude<Domain, 'general'>, DomainTemplate>>;

const CATALOG_FILE = 'domain-templates.json';

let catalog: TemplateCatalog | undefined;

function getCatalog(): TemplateCatalog {
  catalog ??= deepFreeze(loadJsonAsset(CATALOG_FILE, catalogSchema));
  return catalog;
}

export function profileFor(domain: Domain): DomainProfile {
  const templates = getCatalog();
  switch (domain) {
    case 'marketplace':
      return { domain, template: templates.marketplace };
    case 'dashboard':
      return { domain, template: templates.dashboard };
    case 'social':
      return { domain, template: templates.social };
    case 'general':
      return { domain, template: null };
    default: {
      const _exhaustive: never = domain;
      throw new Error(`Unknown domain: ${String(_exhaustive)}`);
    }
  }
}

export function templateFor(domain: Domain): DomainTemplate | null {
  return profileFor(domain).template;
}

// Plans are mutable documents; the catalog is frozen, so hand out copies.

export function copyPages(template: DomainTemplate): Page[] {
  return template.pages.map((page) => ({ name: page.name, components: [...page.components] }));
}

export function copyFeatures(template: DomainTemplate): string[] {
  return [...template.core_features];
}

export function copyFileStructure(template: DomainTemplate): Record<string, string> | undefined {
  return template.file_structure ? { ...template.file_structure } : undefined;
}
