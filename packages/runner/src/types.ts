import type {
  JudgeMode,
  PatternRule,
  ProviderId,
  RunTraceEvent,
  SkillRef
} from '@skillcheck/schemas';

export interface AssertionResult {
  rule: PatternRule;
  matched: boolean;
  satisfied: boolean;
  message: string;
  /** Set when the rule itself could not be compiled. */
  error?: string;
}

export interface JudgePrompt {
  skill: SkillRef;
  system: string;
  text: string;
}

interface VerdictBase {
  provider: ProviderId;
  attempts: number;
  durationMs: number;
}

export interface OkVerdict extends VerdictBase {
  status: 'ok';
  pass: boolean;
  overallScore: number;
  issues: string[];
  rawResponse: string;
}

export interface ParseFailureVerdict extends VerdictBase {
  status: 'parse_failure';
  reason: string;
  rawResponse: string;
}

export interface BackendFailureVerdict extends VerdictBase {
  status: 'backend_failure';
  reason: string;
}

export type JudgeVerdict = OkVerdict | ParseFailureVerdict | BackendFailureVerdict;

export interface CrossValidationReport {
  providers: ProviderId[];
  perProvider: Partial<Record<ProviderId, JudgeVerdict>>;
  succeeded: number;
  averageScore: number;
  agreement: boolean;
  pass: boolean;
}

export type CrossValidationOutcome =
  | { status: 'ok'; report: CrossValidationReport }
  | {
      status: 'insufficient_providers';
      required: number;
      succeeded: number;
      perProvider: Partial<Record<ProviderId, JudgeVerdict>>;
      reason: string;
    };

export type JudgeSignal =
  | { mode: 'none' }
  | { mode: 'single'; verdict: JudgeVerdict }
  | { mode: 'cross'; outcome: CrossValidationOutcome }
  | { mode: 'error'; reason: string };

export interface EvaluationOutcome {
  skill: SkillRef;
  scenario: string;
  assertionResults: AssertionResult[];
  judge: JudgeSignal;
  threshold: number;
  finalPass: boolean;
  failureReasons: string[];
  trace: RunTraceEvent[];
}

export interface ScenarioInput {
  skill: SkillRef;
  scenario: string;
  artifact: string;
  rules: PatternRule[];
  judgeMode: JudgeMode;
  criteria?: string[];
}

export interface CaseReport {
  id: string;
  title: string;
  tags: string[];
  outcome: OutcomeReport;
}

export interface SuiteSummary {
  passed: number;
  failed: number;
  passRate: number;
  averageJudgeScore: number | null;
}

export interface SuiteReport {
  runId: string;
  suiteName: string;
  judgeMode: JudgeMode;
  threshold: number;
  startedAt: string;
  finishedAt: string;
  summary: SuiteSummary;
  cases: CaseReport[];
}

/** JSON-safe projection of an EvaluationOutcome. */
export interface OutcomeReport {
  skill: string;
  scenario: string;
  finalPass: boolean;
  threshold: number;
  failureReasons: string[];
  assertions: {
    ruleId: string;
    polarity: PatternRule['polarity'];
    required: boolean;
    matched: boolean;
    satisfied: boolean;
    message: string;
    error?: string;
  }[];
  judge: JudgeSignal;
  trace: RunTraceEvent[];
}
