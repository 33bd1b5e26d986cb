import type { JudgeResponse } from '@skillcheck/schemas';
import { sleep } from '../util.js';
import type { CompletionRequest, JudgeBackend } from './backend.js';

export interface MockJudgeOptions {
  /** Canned verdict serialized as the backend's JSON answer. */
  verdict?: JudgeResponse;
  /** Raw text returned verbatim instead of `verdict`; used to exercise parse failures. */
  rawResponse?: string;
  /** Simulated latency; the call rejects if aborted first. */
  delayMs?: number;
  /** Reject every call with this message, as a transport failure would. */
  failWith?: string;
}

export const DEFAULT_MOCK_VERDICT: JudgeResponse = {
  pass: true,
  overall_score: 4.5,
  issues: []
};

/**
 * Offline backend for CI. Same prompt in, same text out.
 */
export class MockJudgeBackend implements JudgeBackend {
  readonly provider = 'mock' as const;
  readonly model = 'mock-judge';
  calls = 0;

  constructor(private readonly options: MockJudgeOptions = {}) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.calls += 1;

    if (this.options.delayMs !== undefined) {
      const finished = await sleep(this.options.delayMs, request.signal);
      if (!finished) {
        throw new Error('Mock judge request aborted');
      }
    }

    if (this.options.failWith !== undefined) {
      throw new Error(this.options.failWith);
    }

    if (this.options.rawResponse !== undefined) {
      return this.options.rawResponse;
    }

    return JSON.stringify(this.options.verdict ?? DEFAULT_MOCK_VERDICT);
  }
}
