import { readFileSync } from 'node:fs';
import { z } from 'zod';
import {
  patternRuleSchema,
  providerIdSchema,
  type JudgeMode,
  type PatternRule,
  type ProviderId,
  type SkillRef
} from '@skillcheck/schemas';
import type { HarnessConfig } from '@skillcheck/runner';

export interface JudgeFlags {
  judge?: string;
  cross?: string;
  minProviders?: string;
}

export interface OverrideFlags {
  threshold?: string;
  deadlineMs?: string;
}

export function parseSkillRef(value: string): SkillRef {
  const slash = value.indexOf('/');
  if (slash <= 0 || slash === value.length - 1) {
    throw new Error(`--skill expects <domain>/<name>, got "${value}"`);
  }
  return { domain: value.slice(0, slash), name: value.slice(slash + 1) };
}

function parseProvider(value: string): ProviderId {
  const parsed = providerIdSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(
      `Unknown judge provider: ${value}. Valid values: ${providerIdSchema.options.join(', ')}`
    );
  }
  return parsed.data;
}

export function parseNumberFlag(value: string, flag: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new Error(`${flag} must be a number, got "${value}"`);
  }
  return parsed;
}

function parseMinProviders(value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  const minProviders = parseNumberFlag(value, '--min-providers');
  if (!Number.isInteger(minProviders) || minProviders < 2) {
    throw new Error('--min-providers must be an integer >= 2');
  }
  return minProviders;
}

/** Explicit flags win over the environment-derived mode. */
export function buildJudgeMode(flags: JudgeFlags, fallback: JudgeMode): JudgeMode {
  if (flags.cross) {
    const providers = flags.cross
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
      .map(parseProvider);

    if (providers.length < 2) {
      throw new Error('--cross requires at least two providers, e.g. --cross anthropic,openai');
    }
    return { type: 'cross', providers, minProviders: parseMinProviders(flags.minProviders, 2) };
  }

  const mode: JudgeMode =
    flags.judge === 'none'
      ? { type: 'none' }
      : flags.judge !== undefined
        ? { type: 'single', provider: parseProvider(flags.judge) }
        : fallback;

  if (flags.minProviders !== undefined) {
    if (mode.type !== 'cross') {
      throw new Error(
        '--min-providers only applies to cross-validation; pass --cross or set SKILLCHECK_CROSS_VALIDATE'
      );
    }
    return { ...mode, minProviders: parseMinProviders(flags.minProviders, mode.minProviders) };
  }

  return mode;
}

export function withOverrides(config: HarnessConfig, flags: OverrideFlags): HarnessConfig {
  return {
    ...config,
    ...(flags.threshold !== undefined
      ? { threshold: parseNumberFlag(flags.threshold, '--threshold') }
      : {}),
    ...(flags.deadlineMs !== undefined
      ? { crossDeadlineMs: parseNumberFlag(flags.deadlineMs, '--deadline-ms') }
      : {})
  };
}

export function loadRules(path: string | undefined): PatternRule[] {
  if (path === undefined) {
    return [];
  }
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return z.array(patternRuleSchema).parse(parsed);
}
