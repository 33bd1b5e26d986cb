import { judgeResponseSchema, type ProviderId } from '@skillcheck/schemas';
import { describeError, sleep } from '../util.js';
import type { JudgePrompt, JudgeVerdict } from '../types.js';
import type { JudgeBackend } from './backend.js';

export interface JudgeCallOptions {
  /** Caller-owned cancellation, e.g. a cross-validation deadline. */
  signal?: AbortSignal;
}

export interface JudgeClient {
  readonly provider: ProviderId;
  /** Never rejects; failures come back as non-ok verdicts. */
  judge(prompt: JudgePrompt, options?: JudgeCallOptions): Promise<JudgeVerdict>;
}

export interface JudgeClientOptions {
  timeoutMs: number;
  /** Extra attempts after a backend failure. Parse failures are never retried. */
  maxRetries: number;
  retryDelayMs: number;
}

type AttemptResult = { ok: true; text: string } | { ok: false; reason: string };

type ExtractResult = { ok: true; value: unknown } | { ok: false; reason: string };

function extractJson(raw: string): ExtractResult {
  const stripped = raw
    .trim()
    .replace(/^```(?:json)?\s*\n?/, '')
    .replace(/\n?```\s*$/, '')
    .trim();

  if (stripped.length === 0) {
    return { ok: false, reason: 'Empty response' };
  }

  const start = stripped.indexOf('{');
  const end = stripped.lastIndexOf('}');
  if (start === -1 || end < start) {
    return { ok: false, reason: 'No JSON object found in response' };
  }

  try {
    return { ok: true, value: JSON.parse(stripped.slice(start, end + 1)) };
  } catch (error) {
    return { ok: false, reason: `Malformed JSON: ${describeError(error)}` };
  }
}

export function parseJudgeResponse(
  provider: ProviderId,
  rawResponse: string,
  meta: { attempts: number; durationMs: number }
): JudgeVerdict {
  const extracted = extractJson(rawResponse);
  if (!extracted.ok) {
    return { status: 'parse_failure', provider, reason: extracted.reason, rawResponse, ...meta };
  }

  const parsed = judgeResponseSchema.safeParse(extracted.value);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { status: 'parse_failure', provider, reason, rawResponse, ...meta };
  }

  return {
    status: 'ok',
    provider,
    pass: parsed.data.pass,
    overallScore: parsed.data.overall_score,
    issues: parsed.data.issues,
    rawResponse,
    ...meta
  };
}

export class BackendJudgeClient implements JudgeClient {
  readonly provider: ProviderId;

  constructor(
    private readonly backend: JudgeBackend,
    private readonly options: JudgeClientOptions
  ) {
    this.provider = backend.provider;
  }

  async judge(prompt: JudgePrompt, callOptions: JudgeCallOptions = {}): Promise<JudgeVerdict> {
    const { signal } = callOptions;
    const startedAt = Date.now();
    let attempts = 0;
    let lastReason = 'Aborted by caller before dispatch';

    while (attempts <= this.options.maxRetries && !signal?.aborted) {
      attempts += 1;
      const result = await this.attempt(prompt, signal);

      if (result.ok) {
        return parseJudgeResponse(this.provider, result.text, {
          attempts,
          durationMs: Date.now() - startedAt
        });
      }

      lastReason = result.reason;
      if (attempts <= this.options.maxRetries && this.options.retryDelayMs > 0) {
        await sleep(this.options.retryDelayMs, signal);
      }
    }

    return {
      status: 'backend_failure',
      provider: this.provider,
      reason: lastReason,
      attempts,
      durationMs: Date.now() - startedAt
    };
  }

  private async attempt(prompt: JudgePrompt, signal?: AbortSignal): Promise<AttemptResult> {
    const controller = new AbortController();
    let settle: (result: AttemptResult) => void = () => undefined;
    const interrupted = new Promise<AttemptResult>((resolveInterrupt) => {
      settle = resolveInterrupt;
    });
    const interrupt = (reason: string): void => {
      controller.abort();
      settle({ ok: false, reason });
    };

    const timer = setTimeout(
      () => interrupt(`Timed out after ${this.options.timeoutMs}ms`),
      this.options.timeoutMs
    );
    const onAbort = (): void => interrupt('Aborted by caller');
    signal?.addEventListener('abort', onAbort, { once: true });

    const call = this.backend
      .complete({ system: prompt.system, prompt: prompt.text, signal: controller.signal })
      .then(
        (text): AttemptResult => ({ ok: true, text }),
        (error: unknown): AttemptResult => ({ ok: false, reason: describeError(error) })
      );

    try {
      return await Promise.race([call, interrupted]);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
