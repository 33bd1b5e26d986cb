import type { ProviderId } from '@skillcheck/schemas';

export interface CompletionRequest {
  system: string;
  prompt: string;
  signal: AbortSignal;
}

/**
 * One evaluation backend. Returns the raw completion text; parsing into a
 * verdict happens in the judge client so every provider shares it.
 */
export interface JudgeBackend {
  readonly provider: ProviderId;
  readonly model: string;
  complete(request: CompletionRequest): Promise<string>;
}
