import type { RunTraceEvent } from '@skillcheck/schemas';
import { DEFAULT_THRESHOLD, defaultJudgeSettings, type HarnessConfig, type JudgeSettings } from './config.js';
import { CrossValidator, verdictsOf } from './crossValidator.js';
import { buildJudgePrompt } from './judgePrompt.js';
import { createJudgeClientFactory, type JudgeClientFactory } from './judges/registry.js';
import { evaluatePatterns } from './patternMatcher.js';
import { aggregateOutcome } from './report.js';
import { describeError, now } from './util.js';
import type { EvaluationOutcome, JudgeSignal, JudgeVerdict, ScenarioInput } from './types.js';

export interface ScenarioRunnerOptions {
  /** Minimum judge score on the 0-5 scale. */
  threshold?: number;
  judgeSettings?: JudgeSettings;
  /** Replaces the provider registry, e.g. with fixed clients in tests. */
  createClient?: JudgeClientFactory;
  crossDeadlineMs?: number;
}

function verdictEvent(verdict: JudgeVerdict): RunTraceEvent {
  return {
    type: 'judge_verdict',
    timestamp: now(),
    provider: verdict.provider,
    status: verdict.status,
    attempts: verdict.attempts,
    ...(verdict.status === 'ok' ? { score: verdict.overallScore } : {})
  };
}

export class ScenarioRunner {
  readonly threshold: number;
  private readonly createClient: JudgeClientFactory;
  private readonly crossValidator: CrossValidator;
  private readonly crossDeadlineMs: number | undefined;

  constructor(options: ScenarioRunnerOptions = {}) {
    const threshold = options.threshold ?? DEFAULT_THRESHOLD;
    if (!(threshold >= 0 && threshold <= 5)) {
      throw new RangeError(`threshold must be within 0-5, got ${threshold}`);
    }

    this.threshold = threshold;
    this.createClient =
      options.createClient ?? createJudgeClientFactory(options.judgeSettings ?? defaultJudgeSettings());
    this.crossValidator = new CrossValidator(this.createClient);
    this.crossDeadlineMs = options.crossDeadlineMs;
  }

  /** Resolves with an outcome for every input; judge failures are folded into it. */
  async run(input: ScenarioInput): Promise<EvaluationOutcome> {
    const trace: RunTraceEvent[] = [];
    const enter = (phase: 'pattern_check' | 'judge_dispatch' | 'aggregate' | 'done'): void => {
      trace.push({ type: 'phase_entered', timestamp: now(), phase });
    };

    enter('pattern_check');
    const assertionResults = evaluatePatterns(input.artifact, input.rules);
    for (const result of assertionResults) {
      trace.push({
        type: 'rule_result',
        timestamp: now(),
        ruleId: result.rule.id,
        satisfied: result.satisfied,
        ...(result.satisfied ? {} : { note: result.message })
      });
    }

    let judge: JudgeSignal = { mode: 'none' };
    if (input.judgeMode.type !== 'none') {
      enter('judge_dispatch');
      judge = await this.dispatch(input, trace);
    }

    enter('aggregate');
    const outcome = aggregateOutcome({
      skill: input.skill,
      scenario: input.scenario,
      assertionResults,
      judge,
      threshold: this.threshold,
      trace
    });
    trace.push({ type: 'outcome', timestamp: now(), finalPass: outcome.finalPass });
    enter('done');

    return outcome;
  }

  private async dispatch(input: ScenarioInput, trace: RunTraceEvent[]): Promise<JudgeSignal> {
    const mode = input.judgeMode;

    try {
      const prompt = buildJudgePrompt(input.skill, input.scenario, input.artifact, input.criteria);

      switch (mode.type) {
        case 'none':
          return { mode: 'none' };
        case 'single': {
          trace.push({ type: 'judge_dispatched', timestamp: now(), providers: [mode.provider] });
          const verdict = await this.createClient(mode.provider).judge(prompt);
          trace.push(verdictEvent(verdict));
          return { mode: 'single', verdict };
        }
        case 'cross': {
          trace.push({ type: 'judge_dispatched', timestamp: now(), providers: mode.providers });
          const outcome = await this.crossValidator.evaluate(
            prompt,
            mode.providers,
            mode.minProviders,
            { deadlineMs: this.crossDeadlineMs }
          );
          for (const verdict of verdictsOf(outcome)) {
            trace.push(verdictEvent(verdict));
          }
          trace.push({
            type: 'cross_validation',
            timestamp: now(),
            status: outcome.status,
            ...(outcome.status === 'ok'
              ? { agreement: outcome.report.agreement, averageScore: outcome.report.averageScore }
              : {})
          });
          return { mode: 'cross', outcome };
        }
      }
    } catch (error) {
      return { mode: 'error', reason: describeError(error) };
    }
  }
}

export function createScenarioRunner(config: HarnessConfig): ScenarioRunner {
  return new ScenarioRunner({
    threshold: config.threshold,
    judgeSettings: config.judge,
    ...(config.crossDeadlineMs !== undefined ? { crossDeadlineMs: config.crossDeadlineMs } : {})
  });
}
