import { describe, expect, it } from 'vitest';
import { defaultJudgeSettings } from '../config.js';
import { ScenarioRunner } from '../scenarioRunner.js';
import type { ScenarioInput } from '../types.js';
import { rule } from './helpers.js';

const baseInput: ScenarioInput = {
  skill: { domain: 'frontend', name: 'turbo-page-refresh' },
  scenario: 'I want to add Turbo page refresh with morphing to my Rails app',
  artifact: '<body data-turbo-refresh-method="morph" data-turbo-refresh-scroll="preserve">',
  rules: [rule({ id: 'morph', kind: 'literal', pattern: 'data-turbo-refresh-method="morph"' })],
  judgeMode: { type: 'none' }
};

describe('ScenarioRunner', () => {
  it('passes with the mock judge above threshold', async () => {
    const runner = new ScenarioRunner({
      threshold: 4.0,
      judgeSettings: defaultJudgeSettings({ mock: { verdict: { pass: true, overall_score: 4.5, issues: [] } } })
    });

    const outcome = await runner.run({ ...baseInput, judgeMode: { type: 'single', provider: 'mock' } });

    expect(outcome.finalPass).toBe(true);
    expect(outcome.failureReasons).toEqual([]);
    expect(outcome.judge.mode === 'single' && outcome.judge.verdict.status).toBe('ok');
  });

  it('records the phases it went through', async () => {
    const runner = new ScenarioRunner({ judgeSettings: defaultJudgeSettings() });

    const outcome = await runner.run({ ...baseInput, judgeMode: { type: 'single', provider: 'mock' } });

    expect(outcome.trace.map((event) => (event.type === 'phase_entered' ? event.phase : event.type))).toEqual([
      'pattern_check',
      'rule_result',
      'judge_dispatch',
      'judge_dispatched',
      'judge_verdict',
      'aggregate',
      'outcome',
      'done'
    ]);
  });

  it('skips the judge entirely in none mode', async () => {
    const outcome = await new ScenarioRunner().run(baseInput);

    expect(outcome.judge).toEqual({ mode: 'none' });
    expect(outcome.finalPass).toBe(true);
    expect(outcome.trace.some((event) => event.type === 'judge_dispatched')).toBe(false);
  });

  it('fails on an unsatisfied required rule even when the judge passes', async () => {
    const runner = new ScenarioRunner({ judgeSettings: defaultJudgeSettings() });

    const outcome = await runner.run({
      ...baseInput,
      rules: [rule({ id: 'no-append', kind: 'literal', pattern: 'morph', polarity: 'absent', message: 'No morph' })],
      judgeMode: { type: 'single', provider: 'mock' }
    });

    expect(outcome.finalPass).toBe(false);
    expect(outcome.failureReasons).toEqual(['Pattern rule no-append not satisfied: No morph']);
  });

  it('ignores unsatisfied advisory rules', async () => {
    const outcome = await new ScenarioRunner().run({
      ...baseInput,
      rules: [rule({ id: 'csp', kind: 'literal', pattern: 'csp_meta_tag', required: false })]
    });

    expect(outcome.assertionResults[0]?.satisfied).toBe(false);
    expect(outcome.finalPass).toBe(true);
  });

  it('fails a passing verdict scored below threshold', async () => {
    const runner = new ScenarioRunner({
      threshold: 4,
      judgeSettings: defaultJudgeSettings({ mock: { verdict: { pass: true, overall_score: 3.5, issues: [] } } })
    });

    const outcome = await runner.run({ ...baseInput, judgeMode: { type: 'single', provider: 'mock' } });

    expect(outcome.failureReasons).toEqual(['Judge mock score 3.50 is below threshold 4.00']);
  });

  it('fails on a parse failure without calling it a code-quality verdict', async () => {
    const runner = new ScenarioRunner({
      judgeSettings: defaultJudgeSettings({ mock: { rawResponse: 'All good!' } })
    });

    const outcome = await runner.run({ ...baseInput, judgeMode: { type: 'single', provider: 'mock' } });

    expect(outcome.failureReasons).toEqual([
      'Judge mock response could not be parsed: No JSON object found in response'
    ]);
  });

  it('captures a misconfigured provider as a judge error', async () => {
    const runner = new ScenarioRunner({ judgeSettings: defaultJudgeSettings() });

    const outcome = await runner.run({ ...baseInput, judgeMode: { type: 'single', provider: 'anthropic' } });

    expect(outcome.judge).toEqual({
      mode: 'error',
      reason: 'Judge provider "anthropic" requires ANTHROPIC_API_KEY. Use the mock provider for offline evaluation.'
    });
    expect(outcome.finalPass).toBe(false);
  });

  it('reports insufficient providers in cross mode', async () => {
    const runner = new ScenarioRunner({ judgeSettings: defaultJudgeSettings() });

    const outcome = await runner.run({
      ...baseInput,
      judgeMode: { type: 'cross', providers: ['mock', 'openai'], minProviders: 2 }
    });

    expect(outcome.judge.mode === 'cross' && outcome.judge.outcome.status).toBe('insufficient_providers');
    expect(outcome.failureReasons).toEqual([
      'Cross-validation failed: Only 1 of 2 judge providers returned a usable verdict; 2 required'
    ]);
    expect(outcome.trace.filter((event) => event.type === 'judge_verdict')).toHaveLength(2);
  });

  it.each([6, -0.5, Number.NaN])('rejects threshold %s outside the score scale', (threshold) => {
    expect(() => new ScenarioRunner({ threshold })).toThrow(RangeError);
  });
});
