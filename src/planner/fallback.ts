import { copyFeatures, copyFileStructure, copyPages, templateFor } from './catalog.js';
import { DEFAULT_PROJECT_TYPE } from './completer.js';
import type { CompletedPlan, DesignSystem, Domain, Page, Requirements } from './types.js';

const GENERIC_FEATURES = [
  'User accounts and authentication',
  'Create, edit and delete core records',
  'Search and filtering',
  'Responsive layout for mobile and desktop',
];

const GENERIC_PAGES: Page[] = [
  { name: 'Home', components: ['Navigation bar', 'Hero section', 'Feature highlights', 'Footer'] },
  { name: 'Dashboard', components: ['Record list', 'Create button', 'Search field'] },
  { name: 'Settings', components: ['Profile form', 'Password form'] },
];

const GENERIC_FILE_STRUCTURE: Record<string, string> = {
  'src/App.js': 'Root component and routes',
  'src/index.js': 'Client entry point',
  'src/components/NavBar.js': 'Top navigation bar',
  'src/services/api.js': 'HTTP client for the backend',
  'server/index.js': 'Express server entry point',
  'server/routes/records.js': 'CRUD API for core records',
};

const DESIGN_SYSTEM: DesignSystem = {
  colors: { primary: '#3F51B5', secondary: '#FF9800', background: '#FFFFFF', text: '#212121' },
  typography: { headings: 'Inter', body: 'Roboto' },
};

/**
 * Builds a complete plan without the model. Used when the model call fails or
 * its output cannot be decoded, so every top-level field is filled here.
 */
export function buildFallbackPlan(goal: string, domain: Domain): CompletedPlan {
  const template = templateFor(domain);
  const label = domain === 'general' ? 'application' : `${domain} application`;

  const requirements: Requirements = {
    core_features: template ? copyFeatures(template) : [...GENERIC_FEATURES],
    tech_stack: 'React + Node.js (Express) + PostgreSQL',
    timeline: '4-6 weeks',
  };

  const pages: Page[] = template
    ? copyPages(template)
    : GENERIC_PAGES.map((p) => ({ name: p.name, components: [...p.components] }));

  return {
    goal,
    project_type: DEFAULT_PROJECT_TYPE,
    domain,
    planner: {
      subtasks: [
        `Define requirements and user stories for the ${label}`,
        `Design the data model and architecture for the ${label}`,
        `Implement the core ${label} features`,
        `Test and deploy the ${label}`,
      ],
      requirements: { ...requirements },
    },
    coder: {
      tasks: [
        'Set up the React frontend and Express backend',
        'Create the database schema and migrations',
        ...requirements.core_features.map((feature) => `Implement: ${feature}`),
        'Write integration tests for the API',
      ],
      technical_specs: {
        frontend: 'React',
        backend: 'Node.js with Express',
        database: 'PostgreSQL',
        deployment: 'Docker',
      },
      file_structure: (template && copyFileStructure(template)) ?? { ...GENERIC_FILE_STRUCTURE },
    },
    designer: {
      theme: `Clean, accessible ${label} interface`,
      pages,
      design_system: {
        colors: { ...DESIGN_SYSTEM.colors },
        typography: { ...DESIGN_SYSTEM.typography },
      },
    },
  };
}
