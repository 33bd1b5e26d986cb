import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { RunTraceEvent, SkillRef } from '@skillcheck/schemas';
import { verdictsOf } from './crossValidator.js';
import { formatSkill } from './judgePrompt.js';
import { summarizeAssertions } from './patternMatcher.js';
import type {
  AssertionResult,
  CrossValidationOutcome,
  EvaluationOutcome,
  JudgeSignal,
  JudgeVerdict,
  OutcomeReport,
  SuiteReport
} from './types.js';

function verdictReasons(verdict: JudgeVerdict, threshold: number): string[] {
  switch (verdict.status) {
    case 'backend_failure':
      return [
        `Judge ${verdict.provider} backend failure after ${verdict.attempts} attempt(s): ${verdict.reason}`
      ];
    case 'parse_failure':
      return [`Judge ${verdict.provider} response could not be parsed: ${verdict.reason}`];
    case 'ok': {
      const reasons: string[] = [];
      if (!verdict.pass) {
        reasons.push(`Judge ${verdict.provider} did not pass the artifact`);
      }
      if (verdict.overallScore < threshold) {
        reasons.push(
          `Judge ${verdict.provider} score ${verdict.overallScore.toFixed(2)} is below threshold ${threshold.toFixed(2)}`
        );
      }
      return reasons;
    }
  }
}

function crossReasons(outcome: CrossValidationOutcome, threshold: number): string[] {
  if (outcome.status === 'insufficient_providers') {
    return [`Cross-validation failed: ${outcome.reason}`];
  }

  const { report } = outcome;
  const reasons: string[] = [];
  if (!report.agreement) {
    reasons.push('Judges disagreed on pass/fail');
  } else if (!report.pass) {
    reasons.push('Judges agreed the artifact does not pass');
  }
  if (report.averageScore < threshold) {
    reasons.push(
      `Average judge score ${report.averageScore.toFixed(2)} is below threshold ${threshold.toFixed(2)}`
    );
  }
  return reasons;
}

function judgeReasons(judge: JudgeSignal, threshold: number): string[] {
  switch (judge.mode) {
    case 'none':
      return [];
    case 'single':
      return verdictReasons(judge.verdict, threshold);
    case 'cross':
      return crossReasons(judge.outcome, threshold);
    case 'error':
      return [`Judge dispatch failed: ${judge.reason}`];
  }
}

function ruleReason(result: AssertionResult): string {
  return `Pattern rule ${result.rule.id} not satisfied: ${result.message}`;
}

export function aggregateOutcome(input: {
  skill: SkillRef;
  scenario: string;
  assertionResults: AssertionResult[];
  judge: JudgeSignal;
  threshold: number;
  trace: RunTraceEvent[];
}): EvaluationOutcome {
  const { requiredFailed } = summarizeAssertions(input.assertionResults);
  const failureReasons = [
    ...requiredFailed.map(ruleReason),
    ...judgeReasons(input.judge, input.threshold)
  ];

  return {
    skill: input.skill,
    scenario: input.scenario,
    assertionResults: input.assertionResults,
    judge: input.judge,
    threshold: input.threshold,
    finalPass: failureReasons.length === 0,
    failureReasons,
    trace: input.trace
  };
}

/** Usable judge score for the outcome, or null when no judge produced one. */
export function judgeScoreOf(judge: JudgeSignal): number | null {
  if (judge.mode === 'single' && judge.verdict.status === 'ok') {
    return judge.verdict.overallScore;
  }
  if (judge.mode === 'cross' && judge.outcome.status === 'ok') {
    return judge.outcome.report.averageScore;
  }
  return null;
}

export function toOutcomeReport(outcome: EvaluationOutcome): OutcomeReport {
  return {
    skill: formatSkill(outcome.skill),
    scenario: outcome.scenario,
    finalPass: outcome.finalPass,
    threshold: outcome.threshold,
    failureReasons: outcome.failureReasons,
    assertions: outcome.assertionResults.map((result) => ({
      ruleId: result.rule.id,
      polarity: result.rule.polarity,
      required: result.rule.required,
      matched: result.matched,
      satisfied: result.satisfied,
      message: result.message,
      ...(result.error !== undefined ? { error: result.error } : {})
    })),
    judge: outcome.judge,
    trace: outcome.trace
  };
}

// ─── Human-readable rendering ────────────────────────────────────────────────

function yesNo(value: boolean): string {
  return value ? 'yes' : 'no';
}

function renderVerdictLine(verdict: JudgeVerdict): string {
  if (verdict.status === 'ok') {
    return `${verdict.provider}: pass=${yesNo(verdict.pass)} score=${verdict.overallScore.toFixed(2)}`;
  }
  return `${verdict.provider}: ${verdict.status} (${verdict.reason})`;
}

function renderIssues(issues: string[]): string[] {
  return issues.length === 0 ? ['  issues: none'] : ['  issues:', ...issues.map((i) => `    - ${i}`)];
}

function renderJudge(judge: JudgeSignal, threshold: number): string[] {
  switch (judge.mode) {
    case 'none':
      return ['Judge: skipped'];
    case 'error':
      return ['Judge: error', `  ${judge.reason}`];
    case 'single': {
      const { verdict } = judge;
      const lines = [`Judge (single: ${verdict.provider})`, `  ${renderVerdictLine(verdict)}`];
      if (verdict.status === 'ok') {
        lines.push(`  threshold ${threshold.toFixed(2)}`, ...renderIssues(verdict.issues));
      }
      return lines;
    }
    case 'cross': {
      const { outcome } = judge;
      const verdicts = verdictsOf(outcome);
      const lines = [
        `Judge (cross-validation: ${verdicts.map((v) => v.provider).join(', ')})`,
        ...verdicts.map((verdict) => `  ${renderVerdictLine(verdict)}`)
      ];
      if (outcome.status === 'ok') {
        lines.push(
          `  average ${outcome.report.averageScore.toFixed(2)} (threshold ${threshold.toFixed(2)}), agreement: ${yesNo(outcome.report.agreement)}`
        );
        const issues = verdicts.flatMap((v) =>
          v.status === 'ok' ? v.issues.map((issue) => `[${v.provider}] ${issue}`) : []
        );
        lines.push(...renderIssues(issues));
      } else {
        lines.push(`  ${outcome.reason}`);
      }
      return lines;
    }
  }
}

export function renderOutcomeText(outcome: EvaluationOutcome): string {
  const summary = summarizeAssertions(outcome.assertionResults);
  const lines = [
    `${outcome.finalPass ? 'PASS' : 'FAIL'} ${formatSkill(outcome.skill)}`,
    `Scenario: ${outcome.scenario}`,
    '',
    `Pattern checks (${summary.satisfied}/${summary.total} satisfied)`
  ];

  if (outcome.assertionResults.length === 0) {
    lines.push('  (no rules)');
  }
  for (const result of outcome.assertionResults) {
    const mark = result.satisfied ? '✓' : '✗';
    const advisory = result.rule.required ? '' : ' (advisory)';
    lines.push(`  ${mark} ${result.rule.id}${advisory}: ${result.message}`);
  }

  lines.push('', ...renderJudge(outcome.judge, outcome.threshold));

  if (outcome.failureReasons.length > 0) {
    lines.push('', 'Failure reasons', ...outcome.failureReasons.map((reason) => `  - ${reason}`));
  }

  return lines.join('\n');
}

export function writeReport(report: SuiteReport, outputPath: string): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, JSON.stringify(report, null, 2), 'utf8');
}
