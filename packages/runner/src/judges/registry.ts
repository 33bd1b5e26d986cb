import type { ProviderId } from '@skillcheck/schemas';
import type { JudgeSettings, LiveProviderId } from '../config.js';
import type { JudgeBackend } from './backend.js';
import { BackendJudgeClient, type JudgeClient, type JudgeClientOptions } from './judgeClient.js';
import { MockJudgeBackend } from './mockBackend.js';
import { AnthropicJudgeBackend, GeminiJudgeBackend, OpenAIJudgeBackend } from './providers.js';

export type JudgeClientFactory = (
  provider: ProviderId,
  overrides?: Partial<JudgeClientOptions>
) => JudgeClient;

const API_KEY_ENV: Record<LiveProviderId, string> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
  gemini: 'GEMINI_API_KEY'
};

function requireApiKey(provider: LiveProviderId, settings: JudgeSettings): string {
  const apiKey = settings.apiKeys[provider];
  if (!apiKey) {
    throw new Error(
      `Judge provider "${provider}" requires ${API_KEY_ENV[provider]}. ` +
        'Use the mock provider for offline evaluation.'
    );
  }
  return apiKey;
}

export function createJudgeBackend(provider: ProviderId, settings: JudgeSettings): JudgeBackend {
  switch (provider) {
    case 'mock':
      return new MockJudgeBackend(settings.mock);
    case 'anthropic':
      return new AnthropicJudgeBackend(requireApiKey(provider, settings), settings.models.anthropic);
    case 'openai':
      return new OpenAIJudgeBackend(requireApiKey(provider, settings), settings.models.openai);
    case 'gemini':
      return new GeminiJudgeBackend(requireApiKey(provider, settings), settings.models.gemini);
  }
}

export function createJudgeClientFactory(settings: JudgeSettings): JudgeClientFactory {
  return (provider, overrides = {}) =>
    new BackendJudgeClient(createJudgeBackend(provider, settings), {
      timeoutMs: settings.timeoutMs,
      maxRetries: settings.maxRetries,
      retryDelayMs: settings.retryDelayMs,
      ...overrides
    });
}
