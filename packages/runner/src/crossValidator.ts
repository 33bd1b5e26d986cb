import type { ProviderId } from '@skillcheck/schemas';
import type { JudgeClientFactory } from './judges/registry.js';
import { describeError } from './util.js';
import type {
  CrossValidationOutcome,
  JudgePrompt,
  JudgeVerdict,
  OkVerdict
} from './types.js';

export interface CrossValidationOptions {
  /** Overall budget for the whole fan-out; pending calls past it are dropped. */
  deadlineMs?: number;
}

/** Every provider's verdict, in dispatch order. */
export function verdictsOf(outcome: CrossValidationOutcome): JudgeVerdict[] {
  const perProvider = outcome.status === 'ok' ? outcome.report.perProvider : outcome.perProvider;
  return Object.values(perProvider).filter(
    (verdict): verdict is JudgeVerdict => verdict !== undefined
  );
}

/**
 * Computes agreement and the averaged score over usable verdicts only.
 * Backend and parse failures count neither as votes nor toward the mean.
 */
export function summarizeCrossValidation(
  providers: ProviderId[],
  perProvider: Partial<Record<ProviderId, JudgeVerdict>>,
  minProviders: number
): CrossValidationOutcome {
  const usable = providers
    .map((provider) => perProvider[provider])
    .filter((verdict): verdict is OkVerdict => verdict?.status === 'ok');

  if (usable.length < minProviders) {
    return {
      status: 'insufficient_providers',
      required: minProviders,
      succeeded: usable.length,
      perProvider,
      reason:
        `Only ${usable.length} of ${providers.length} judge providers returned a usable verdict; ` +
        `${minProviders} required`
    };
  }

  const averageScore = usable.reduce((acc, verdict) => acc + verdict.overallScore, 0) / usable.length;
  const agreement = new Set(usable.map((verdict) => verdict.pass)).size === 1;

  return {
    status: 'ok',
    report: {
      providers,
      perProvider,
      succeeded: usable.length,
      averageScore,
      agreement,
      pass: agreement && usable.every((verdict) => verdict.pass)
    }
  };
}

export class CrossValidator {
  constructor(private readonly createClient: JudgeClientFactory) {}

  async evaluate(
    prompt: JudgePrompt,
    providers: ProviderId[],
    minProviders = 2,
    options: CrossValidationOptions = {}
  ): Promise<CrossValidationOutcome> {
    if (!Number.isInteger(minProviders) || minProviders < 2) {
      throw new RangeError(`minProviders must be an integer >= 2, got ${minProviders}`);
    }

    const unique = [...new Set(providers)];
    const { deadlineMs } = options;
    const controller = new AbortController();
    const pending = new Set<ProviderId>(unique);
    const abandoned = new Set<ProviderId>();

    let expire: () => void = () => undefined;
    const expired = new Promise<undefined>((resolveExpired) => {
      expire = () => resolveExpired(undefined);
    });
    const timer =
      deadlineMs === undefined
        ? undefined
        : setTimeout(() => {
            for (const provider of pending) {
              abandoned.add(provider);
            }
            expire();
            controller.abort();
          }, deadlineMs);

    try {
      const entries = await Promise.all(
        unique.map(async (provider): Promise<[ProviderId, JudgeVerdict]> => {
          const startedAt = Date.now();
          const dispatched = this.dispatch(provider, prompt, controller.signal).then((verdict) => {
            pending.delete(provider);
            return verdict;
          });
          const verdict = await Promise.race([dispatched, expired]);

          if (verdict === undefined || abandoned.has(provider)) {
            return [
              provider,
              {
                status: 'backend_failure',
                provider,
                reason: `Overall deadline of ${deadlineMs ?? 0}ms exceeded`,
                attempts: 1,
                durationMs: Date.now() - startedAt
              }
            ];
          }
          return [provider, verdict];
        })
      );

      const perProvider: Partial<Record<ProviderId, JudgeVerdict>> = {};
      for (const [provider, verdict] of entries) {
        perProvider[provider] = verdict;
      }

      return summarizeCrossValidation(unique, perProvider, minProviders);
    } finally {
      clearTimeout(timer);
    }
  }

  private async dispatch(
    provider: ProviderId,
    prompt: JudgePrompt,
    signal: AbortSignal
  ): Promise<JudgeVerdict> {
    try {
      // Cross-validation never retries; a slow provider just drops out.
      const client = this.createClient(provider, { maxRetries: 0 });
      return await client.judge(prompt, { signal });
    } catch (error) {
      return {
        status: 'backend_failure',
        provider,
        reason: describeError(error),
        attempts: 0,
        durationMs: 0
      };
    }
  }
}
