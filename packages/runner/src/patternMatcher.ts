import type { PatternRule } from '@skillcheck/schemas';
import type { AssertionResult } from './types.js';

export interface AssertionSummary {
  total: number;
  satisfied: number;
  requiredFailed: AssertionResult[];
  advisoryFailed: AssertionResult[];
}

function compileRule(rule: PatternRule): RegExp | Error {
  try {
    return new RegExp(rule.pattern, rule.flags);
  } catch (error) {
    return error instanceof Error ? error : new Error(String(error));
  }
}

function evaluateRule(artifact: string, rule: PatternRule): AssertionResult {
  if (rule.kind === 'regex') {
    const compiled = compileRule(rule);
    if (compiled instanceof Error) {
      const error = `Invalid pattern in rule ${rule.id}: ${compiled.message}`;
      return { rule, matched: false, satisfied: false, message: error, error };
    }

    // An empty artifact matches nothing, even patterns like /^$/.
    const matched = artifact.length > 0 && compiled.test(artifact);
    return finish(rule, matched);
  }

  const matched = artifact.length > 0 && artifact.includes(rule.pattern);
  return finish(rule, matched);
}

function finish(rule: PatternRule, matched: boolean): AssertionResult {
  const satisfied = rule.polarity === 'present' ? matched : !matched;
  return { rule, matched, satisfied, message: rule.message };
}

export function evaluatePatterns(artifact: string, rules: PatternRule[]): AssertionResult[] {
  return rules.map((rule) => evaluateRule(artifact, rule));
}

export function summarizeAssertions(results: AssertionResult[]): AssertionSummary {
  const failed = results.filter((result) => !result.satisfied);
  return {
    total: results.length,
    satisfied: results.length - failed.length,
    requiredFailed: failed.filter((result) => result.rule.required),
    advisoryFailed: failed.filter((result) => !result.rule.required)
  };
}
