import { z } from 'zod';

// ─── Skills and pattern rules ────────────────────────────────────────────────

export const skillRefSchema = z.object({
  domain: z.string().min(1),
  name: z.string().min(1)
});

export const patternRuleSchema = z
  .object({
    id: z.string().min(1),
    kind: z.enum(['literal', 'regex']).default('regex'),
    pattern: z.string().min(1),
    flags: z.string().optional(),
    polarity: z.enum(['present', 'absent']),
    message: z.string().min(1),
    required: z.boolean().default(true)
  })
  .refine((rule) => rule.kind === 'regex' || rule.flags === undefined, {
    message: 'flags apply to regex rules only',
    path: ['flags']
  });

// ─── Judge providers and modes ───────────────────────────────────────────────

export const providerIdSchema = z.enum(['mock', 'anthropic', 'openai', 'gemini']);

export const judgeModeSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('none')
  }),
  z.object({
    type: z.literal('single'),
    provider: providerIdSchema
  }),
  z.object({
    type: z.literal('cross'),
    providers: z.array(providerIdSchema).min(2),
    minProviders: z.number().int().min(2).default(2)
  })
]);

// Shape a judge backend must answer with, after JSON extraction.
export const judgeResponseSchema = z.object({
  pass: z.boolean(),
  overall_score: z.number().finite().min(0).max(5),
  issues: z.array(z.string())
});

// ─── Scenario case files ─────────────────────────────────────────────────────

export const scenarioCaseSchema = z
  .object({
    schemaVersion: z.literal('0.1.0'),
    id: z.string().min(1),
    title: z.string().min(1),
    skill: skillRefSchema,
    scenario: z.string().min(1),
    artifact: z.string().optional(),
    artifactPath: z.string().min(1).optional(),
    rules: z.array(patternRuleSchema).default([]),
    criteria: z.array(z.string().min(1)).default([]),
    tags: z.array(z.string().min(1)).default([])
  })
  .refine((value) => (value.artifact === undefined) !== (value.artifactPath === undefined), {
    message: 'Exactly one of artifact or artifactPath must be set'
  });

export const runConfigSchema = z.object({
  suiteName: z.string().default('skills'),
  casesPath: z.string().min(1),
  judgeMode: judgeModeSchema.default({ type: 'none' }),
  threshold: z.number().min(0).max(5).default(4),
  crossDeadlineMs: z.number().int().positive().optional()
});

// ─── Harness environment ─────────────────────────────────────────────────────

const envFlag = z
  .string()
  .optional()
  .transform((value) => value !== undefined && ['1', 'true', 'yes'].includes(value.toLowerCase()));

const providerList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? 'anthropic,openai')
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  )
  .pipe(z.array(providerIdSchema).min(2));

export const harnessEnvSchema = z.object({
  SKILLCHECK_INTEGRATION: envFlag,
  SKILLCHECK_CROSS_VALIDATE: envFlag,
  SKILLCHECK_JUDGE_PROVIDER: providerIdSchema.default('mock'),
  SKILLCHECK_CROSS_PROVIDERS: providerList,
  SKILLCHECK_MIN_PROVIDERS: z.coerce.number().int().min(2).default(2),
  SKILLCHECK_SCORE_THRESHOLD: z.coerce.number().min(0).max(5).default(4),
  SKILLCHECK_JUDGE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SKILLCHECK_JUDGE_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(1),
  SKILLCHECK_CROSS_DEADLINE_MS: z.coerce.number().int().positive().optional(),
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  OPENAI_API_KEY: z.string().min(1).optional(),
  GEMINI_API_KEY: z.string().min(1).optional(),
  SKILLCHECK_ANTHROPIC_MODEL: z.string().min(1).optional(),
  SKILLCHECK_OPENAI_MODEL: z.string().min(1).optional(),
  SKILLCHECK_GEMINI_MODEL: z.string().min(1).optional()
});

// ─── Run trace events ─────────────────────────────────────────────────────────

export const runTraceEventSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('phase_entered'),
    timestamp: z.string().datetime(),
    phase: z.enum(['pattern_check', 'judge_dispatch', 'aggregate', 'done'])
  }),
  z.object({
    type: z.literal('rule_result'),
    timestamp: z.string().datetime(),
    ruleId: z.string(),
    satisfied: z.boolean(),
    note: z.string().optional()
  }),
  z.object({
    type: z.literal('judge_dispatched'),
    timestamp: z.string().datetime(),
    providers: z.array(providerIdSchema)
  }),
  z.object({
    type: z.literal('judge_verdict'),
    timestamp: z.string().datetime(),
    provider: providerIdSchema,
    status: z.enum(['ok', 'parse_failure', 'backend_failure']),
    attempts: z.number().int().min(0),
    score: z.number().optional()
  }),
  z.object({
    type: z.literal('cross_validation'),
    timestamp: z.string().datetime(),
    status: z.enum(['ok', 'insufficient_providers']),
    agreement: z.boolean().optional(),
    averageScore: z.number().optional()
  }),
  z.object({
    type: z.literal('outcome'),
    timestamp: z.string().datetime(),
    finalPass: z.boolean()
  })
]);

export type SkillRef = z.infer<typeof skillRefSchema>;
export type PatternRule = z.infer<typeof patternRuleSchema>;
export type PatternRuleInput = z.input<typeof patternRuleSchema>;
export type ProviderId = z.infer<typeof providerIdSchema>;
export type JudgeMode = z.infer<typeof judgeModeSchema>;
export type JudgeModeInput = z.input<typeof judgeModeSchema>;
export type JudgeResponse = z.infer<typeof judgeResponseSchema>;
export type ScenarioCase = z.infer<typeof scenarioCaseSchema>;
export type RunConfig = z.infer<typeof runConfigSchema>;
export type RunConfigInput = z.input<typeof runConfigSchema>;
export type HarnessEnv = z.infer<typeof harnessEnvSchema>;
export type RunTraceEvent = z.infer<typeof runTraceEventSchema>;
