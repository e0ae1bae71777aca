import { DomainClassifier } from '../../../src/planner/classifier.js';
import { ModelInvocationError } from '../../../src/utils/errors.js';
import { RecordingReporter, ScriptedRunner } from '../helpers/scripted-runner.js';

function classifierWith(runner: ScriptedRunner, reporter = new RecordingReporter()) {
  return new DomainClassifier(runner, { reporter });
}

describe('DomainClassifier', () => {
  it.each([
    ['marketplace', 'marketplace'],
    ['dashboard', 'dashboard'],
    ['social', 'social'],
    ['general', 'general'],
    ['  Dashboard \n', 'dashboard'],
    ['SOCIAL', 'social'],
  ])('should map the answer %j to %s', async (answer, expected) => {
    const runner = new ScriptedRunner().reply(answer);
    await expect(classifierWith(runner).classify('Some goal')).resolves.toBe(expected);
  });

  it.each(['marketplace.', 'e-commerce', 'The domain is social', ''])(
    'should fall back to general for %j',
    async (answer) => {
      const runner = new ScriptedRunner().reply(answer);
      const outcome = await classifierWith(runner).evaluate('Some goal');

      expect(outcome).toEqual({
        kind: 'degraded',
        value: 'general',
        reason: `model answered ${JSON.stringify(answer.trim())}, which is not a known domain`,
      });
    },
  );

  it('should fall back to general when the call fails', async () => {
    const runner = new ScriptedRunner().fail(new ModelInvocationError('gemini', 'quota exceeded'));
    const reporter = new RecordingReporter();

    const outcome = await classifierWith(runner, reporter).evaluate('Some goal');

    expect(outcome).toEqual({
      kind: 'degraded',
      value: 'general',
      reason: 'classification call failed (gemini: quota exceeded)',
    });
    expect(reporter.messages('warn')).toEqual([
      'Domain classification defaulted to "general": classification call failed (gemini: quota exceeded)',
    ]);
  });

  it('should report the domain it found', async () => {
    const reporter = new RecordingReporter();
    await classifierWith(new ScriptedRunner().reply('social'), reporter).classify('Photo sharing');

    expect(reporter.entries).toEqual([
      { level: 'info', message: 'Classifying goal domain...' },
      { level: 'info', message: 'Domain: social' },
    ]);
  });

  it('should make one short call with the goal in the prompt', async () => {
    const runner = new ScriptedRunner().reply('dashboard');
    await classifierWith(runner).classify('Monitor warehouse stock levels');

    expect(runner.calls).toHaveLength(1);
    expect(runner.calls[0].options).toEqual({ maxTokens: 10 });
    expect(runner.calls[0].prompt).toContain('Goal: Monitor warehouse stock levels\nDomain:');
  });

  it('should honour a custom token limit', async () => {
    const runner = new ScriptedRunner().reply('general');
    const classifier = new DomainClassifier(runner, { maxTokens: 3, reporter: new RecordingReporter() });
    await classifier.classify('g');
    expect(runner.calls[0].options.maxTokens).toBe(3);
  });
});
