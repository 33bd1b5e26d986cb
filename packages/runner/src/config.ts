import { harnessEnvSchema, type JudgeMode, type ProviderId } from '@skillcheck/schemas';
import type { MockJudgeOptions } from './judges/mockBackend.js';

export type LiveProviderId = Exclude<ProviderId, 'mock'>;

export interface JudgeSettings {
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  apiKeys: Partial<Record<LiveProviderId, string>>;
  models: Partial<Record<LiveProviderId, string>>;
  mock?: MockJudgeOptions;
}

export interface HarnessConfig {
  /** Live judges are consulted only when set. */
  integration: boolean;
  crossValidate: boolean;
  judgeProvider: ProviderId;
  crossProviders: ProviderId[];
  minProviders: number;
  threshold: number;
  crossDeadlineMs?: number;
  judge: JudgeSettings;
}

export const DEFAULT_THRESHOLD = 4;
export const DEFAULT_RETRY_DELAY_MS = 500;

export function defaultJudgeSettings(overrides: Partial<JudgeSettings> = {}): JudgeSettings {
  return {
    timeoutMs: 30_000,
    maxRetries: 1,
    retryDelayMs: DEFAULT_RETRY_DELAY_MS,
    apiKeys: {},
    models: {},
    ...overrides
  };
}

export function loadHarnessConfig(
  env: Record<string, string | undefined> = process.env
): HarnessConfig {
  const parsed = harnessEnvSchema.parse(env);

  return {
    integration: parsed.SKILLCHECK_INTEGRATION,
    crossValidate: parsed.SKILLCHECK_CROSS_VALIDATE,
    judgeProvider: parsed.SKILLCHECK_JUDGE_PROVIDER,
    crossProviders: parsed.SKILLCHECK_CROSS_PROVIDERS,
    minProviders: parsed.SKILLCHECK_MIN_PROVIDERS,
    threshold: parsed.SKILLCHECK_SCORE_THRESHOLD,
    ...(parsed.SKILLCHECK_CROSS_DEADLINE_MS !== undefined
      ? { crossDeadlineMs: parsed.SKILLCHECK_CROSS_DEADLINE_MS }
      : {}),
    judge: defaultJudgeSettings({
      timeoutMs: parsed.SKILLCHECK_JUDGE_TIMEOUT_MS,
      maxRetries: parsed.SKILLCHECK_JUDGE_MAX_RETRIES,
      apiKeys: {
        anthropic: parsed.ANTHROPIC_API_KEY,
        openai: parsed.OPENAI_API_KEY,
        gemini: parsed.GEMINI_API_KEY
      },
      models: {
        anthropic: parsed.SKILLCHECK_ANTHROPIC_MODEL,
        openai: parsed.SKILLCHECK_OPENAI_MODEL,
        gemini: parsed.SKILLCHECK_GEMINI_MODEL
      }
    })
  };
}

export function resolveJudgeMode(config: HarnessConfig): JudgeMode {
  if (!config.integration) {
    return { type: 'none' };
  }

  if (config.crossValidate) {
    return {
      type: 'cross',
      providers: config.crossProviders,
      minProviders: config.minProviders
    };
  }

  return { type: 'single', provider: config.judgeProvider };
}
