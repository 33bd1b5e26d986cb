import type { PatternRule, ProviderId } from '@skillcheck/schemas';
import type { JudgeBackend } from '../judges/backend.js';
import type { OkVerdict } from '../types.js';

export function rule(overrides: Partial<PatternRule> & Pick<PatternRule, 'id' | 'pattern'>): PatternRule {
  return {
    kind: 'regex',
    polarity: 'present',
    message: `${overrides.id} failed`,
    required: true,
    ...overrides
  };
}

export function okVerdict(
  provider: ProviderId,
  pass: boolean,
  overallScore: number,
  issues: string[] = []
): OkVerdict {
  return {
    status: 'ok',
    provider,
    pass,
    overallScore,
    issues,
    rawResponse: JSON.stringify({ pass, overall_score: overallScore, issues }),
    attempts: 1,
    durationMs: 0
  };
}

/** Backend answering with fixed text after an optional delay. */
export function fixedBackend(
  provider: ProviderId,
  answer: string,
  delayMs = 0
): JudgeBackend & { calls: number } {
  return {
    provider,
    model: 'fixed',
    calls: 0,
    async complete(request) {
      this.calls += 1;
      if (delayMs > 0) {
        await new Promise<void>((resolveDelay, rejectDelay) => {
          const timer = setTimeout(resolveDelay, delayMs);
          request.signal.addEventListener(
            'abort',
            () => {
              clearTimeout(timer);
              rejectDelay(new Error('aborted'));
            },
            { once: true }
          );
        });
      }
      return answer;
    }
  };
}
