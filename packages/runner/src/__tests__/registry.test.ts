import { beforeEach, describe, expect, it, vi } from 'vitest';
import { defaultJudgeSettings } from '../config.js';
import { buildJudgePrompt } from '../judgePrompt.js';
import { MockJudgeBackend } from '../judges/mockBackend.js';
import { AnthropicJudgeBackend, GeminiJudgeBackend, OpenAIJudgeBackend } from '../judges/providers.js';
import { createJudgeBackend, createJudgeClientFactory } from '../judges/registry.js';

const mocks = vi.hoisted(() => ({
  anthropicCreate: vi.fn(),
  openaiCreate: vi.fn(),
  geminiGenerate: vi.fn(),
  geminiModel: vi.fn()
}));

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create: mocks.anthropicCreate };
  }
}));

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create: mocks.openaiCreate } };
  }
}));

vi.mock('@google/generative-ai', () => ({
  GoogleGenerativeAI: class {
    getGenerativeModel = mocks.geminiModel;
  }
}));

const prompt = buildJudgePrompt({ domain: 'frontend', name: 'turbo-page-refresh' }, 'Add morphing', '<body>');
const settings = defaultJudgeSettings({
  apiKeys: { anthropic: 'test-secret', openai: 'test-secret', gemini: 'test-secret' }
});

beforeEach(() => {
  vi.clearAllMocks();
  mocks.geminiModel.mockImplementation(() => ({ generateContent: mocks.geminiGenerate }));
});

describe('createJudgeBackend', () => {
  it('builds the backend for each provider', () => {
    expect(createJudgeBackend('mock', settings)).toBeInstanceOf(MockJudgeBackend);
    expect(createJudgeBackend('anthropic', settings)).toBeInstanceOf(AnthropicJudgeBackend);
    expect(createJudgeBackend('openai', settings)).toBeInstanceOf(OpenAIJudgeBackend);
    expect(createJudgeBackend('gemini', settings)).toBeInstanceOf(GeminiJudgeBackend);
  });

  it('uses configured model names', () => {
    const backend = createJudgeBackend('openai', { ...settings, models: { openai: 'gpt-test' } });

    expect(backend.model).toBe('gpt-test');
  });

  it('requires an API key for live providers', () => {
    expect(() => createJudgeBackend('gemini', defaultJudgeSettings())).toThrow(
      'Judge provider "gemini" requires GEMINI_API_KEY. Use the mock provider for offline evaluation.'
    );
  });
});

describe('provider backends', () => {
  it('reads the text block from an Anthropic response', async () => {
    mocks.anthropicCreate.mockResolvedValue({
      content: [{ type: 'text', text: '{"pass": true, "overall_score": 4, "issues": []}' }]
    });

    const verdict = await createJudgeClientFactory(settings)('anthropic').judge(prompt);

    expect(verdict.status === 'ok' && verdict.overallScore).toBe(4);
    const [body, options] = mocks.anthropicCreate.mock.calls[0] ?? [];
    expect(body).toMatchObject({ system: prompt.system, temperature: 0 });
    expect(options.signal).toBeInstanceOf(AbortSignal);
  });

  it('requests JSON mode from OpenAI', async () => {
    mocks.openaiCreate.mockResolvedValue({
      choices: [{ message: { content: '{"pass": false, "overall_score": 1, "issues": ["No morph"]}' } }]
    });

    const verdict = await createJudgeClientFactory(settings)('openai').judge(prompt);

    expect(verdict.status === 'ok' && verdict.issues).toEqual(['No morph']);
    expect(mocks.openaiCreate.mock.calls[0]?.[0]).toMatchObject({
      model: 'gpt-4o-mini',
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: prompt.system },
        { role: 'user', content: prompt.text }
      ]
    });
  });

  it('reads Gemini response text', async () => {
    mocks.geminiGenerate.mockResolvedValue({
      response: { text: () => '{"pass": true, "overall_score": 5, "issues": []}' }
    });

    const verdict = await createJudgeClientFactory(settings)('gemini').judge(prompt);

    expect(verdict.status === 'ok' && verdict.overallScore).toBe(5);
    expect(mocks.geminiModel.mock.calls[0]?.[0]).toMatchObject({
      model: 'gemini-2.0-flash',
      systemInstruction: prompt.system
    });
  });

  it('turns an SDK error into a backend failure', async () => {
    mocks.anthropicCreate.mockRejectedValue(new Error('529 overloaded'));

    const verdict = await createJudgeClientFactory({ ...settings, maxRetries: 0 })('anthropic').judge(prompt);

    expect(verdict).toMatchObject({ status: 'backend_failure', reason: '529 overloaded', attempts: 1 });
  });

  it('applies per-call overrides', async () => {
    mocks.openaiCreate.mockRejectedValue(new Error('503'));

    const verdict = await createJudgeClientFactory({ ...settings, retryDelayMs: 0, maxRetries: 3 })('openai', {
      maxRetries: 0
    }).judge(prompt);

    expect(verdict.attempts).toBe(1);
    expect(mocks.openaiCreate).toHaveBeenCalledTimes(1);
  });
});
