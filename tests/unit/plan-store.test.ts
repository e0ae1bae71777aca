import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { parse as parseYaml } from 'yaml';

import {
  FilePlanStore,
  cleanSubtasks,
  loadPlan,
  orderPlanFields,
  serializePlan,
} from '../../src/core/plan-store.js';
import type { Plan } from '../../src/planner/types.js';
import { PersistenceError, PlanValidationError } from '../../src/utils/errors.js';

function samplePlan(): Plan {
  return {
    designer: { theme: 'Forest green', pages: [{ name: 'Trails', components: ['Map'] }] },
    generated_at: '2026-03-01T09:00:00.001Z',
    goal: 'Hiking group app',
    notes: 'extra field from the model',
    coder: { tasks: ['Build map'] },
    planner: { subtasks: ['Design', 'Build'], requirements: { core_features: ['Group rides'] } },
    domain: 'social',
    project_type: 'web_application',
  };
}

describe('orderPlanFields', () => {
  it('should put known fields first and keep extra fields after them', () => {
    expect(Object.keys(orderPlanFields(samplePlan()))).toEqual([
      'goal',
      'project_type',
      'domain',
      'planner',
      'coder',
      'designer',
      'generated_at',
      'notes',
    ]);
  });
});

describe('serializePlan', () => {
  it('should write indented JSON with a trailing newline', () => {
    const text = serializePlan(samplePlan(), 'plan.json');
    expect(text.startsWith('{\n  "goal": "Hiking group app",\n  "project_type": "web_application",')).toBe(true);
    expect(text.endsWith('}\n')).toBe(true);
  });

  it('should write YAML for .yaml and .yml destinations', () => {
    expect(serializePlan(samplePlan(), 'plan.yaml').startsWith('goal: Hiking group app\n')).toBe(true);
    expect(parseYaml(serializePlan(samplePlan(), 'out/PLAN.YML'))).toEqual(samplePlan());
  });
});

describe('FilePlanStore', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'planwright-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should create missing directories and write the plan', async () => {
    const destination = join(tempDir, 'nested', 'dir', 'plan.json');

    const result = await new FilePlanStore().save(samplePlan(), destination);

    expect(result).toEqual({ path: destination, status: 'created' });
    expect(JSON.parse(await readFile(destination, 'utf-8'))).toEqual(samplePlan());
  });

  it('should report an overwrite as modified', async () => {
    const destination = join(tempDir, 'plan.json');
    await writeFile(destination, '{}');

    const result = await new FilePlanStore().save(samplePlan(), destination);

    expect(result.status).toBe('modified');
  });

  it('should wrap write failures in PersistenceError', async () => {
    const blocker = join(tempDir, 'not-a-dir');
    await writeFile(blocker, 'file');
    const destination = join(blocker, 'plan.json');

    const error = await new FilePlanStore().save(samplePlan(), destination).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PersistenceError);
    expect(error).toHaveProperty('destination', destination);
  });

  it('should round-trip through loadPlan', async () => {
    for (const name of ['plan.json', 'plan.yaml']) {
      const destination = join(tempDir, name);
      await new FilePlanStore().save(samplePlan(), destination);

      const loaded = await loadPlan(destination);

      expect(loaded).toEqual(samplePlan());
    }
  });
});

describe('loadPlan', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'planwright-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should list every missing field', async () => {
    const path = join(tempDir, 'plan.json');
    await writeFile(path, JSON.stringify({ planner: { subtasks: ['a', 3] } }));

    const error = await loadPlan(path).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PlanValidationError);
    expect(error).toHaveProperty('issues', [
      'goal: Required',
      'planner.subtasks.1: Expected string, received number',
      'coder: Required',
    ]);
  });

  it('should reject a file that is not JSON', async () => {
    const path = join(tempDir, 'plan.json');
    await writeFile(path, 'goal: yaml in a json file');

    await expect(loadPlan(path)).rejects.toThrow(/^Invalid plan in .*plan\.json:\n {2}- not valid JSON \(/);
  });

  it('should reject a missing file', async () => {
    const path = join(tempDir, 'missing.json');

    await expect(loadPlan(path)).rejects.toThrow(PlanValidationError);
  });
});

describe('cleanSubtasks', () => {
  it('should drop everything from the first noisy entry', () => {
    expect(
      cleanSubtasks([
        'Set up the repo',
        'Build the feed',
        'Question 1: Which tool would you use?',
        'Deploy',
      ]),
    ).toEqual(['Set up the repo', 'Build the feed']);
  });

  it('should match markers case-insensitively', () => {
    expect(cleanSubtasks(['Plan sprints', 'Track it in Trello'])).toEqual(['Plan sprints']);
  });

  it('should keep a clean list unchanged', () => {
    expect(cleanSubtasks(['Design', 'Build', 'Ship'])).toEqual(['Design', 'Build', 'Ship']);
  });
});
