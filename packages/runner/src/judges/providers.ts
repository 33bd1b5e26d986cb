import Anthropic from '@anthropic-ai/sdk';
import { GoogleGenerativeAI } from '@google/generative-ai';
import OpenAI from 'openai';
import type { CompletionRequest, JudgeBackend } from './backend.js';

const MAX_TOKENS = 1024;

/**
 * Anthropic Claude backend using the Messages API.
 */
export class AnthropicJudgeBackend implements JudgeBackend {
  readonly provider = 'anthropic' as const;
  readonly model: string;
  private client: Anthropic;

  constructor(apiKey: string, model?: string) {
    // Retries are owned by the judge client.
    this.client = new Anthropic({ apiKey, maxRetries: 0 });
    this.model = model ?? 'claude-3-5-haiku-latest';
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: MAX_TOKENS,
        temperature: 0,
        system: request.system,
        messages: [{ role: 'user', content: request.prompt }]
      },
      { signal: request.signal }
    );

    const textBlock = response.content.find((block) => block.type === 'text');
    return textBlock && 'text' in textBlock ? textBlock.text : '';
  }
}

/**
 * OpenAI backend using Chat Completions in JSON mode.
 */
export class OpenAIJudgeBackend implements JudgeBackend {
  readonly provider = 'openai' as const;
  readonly model: string;
  private client: OpenAI;

  constructor(apiKey: string, model?: string) {
    this.client = new OpenAI({ apiKey, maxRetries: 0 });
    this.model = model ?? 'gpt-4o-mini';
  }

  async complete(request: CompletionRequest): Promise<string> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [
      { role: 'system', content: request.system },
      { role: 'user', content: request.prompt }
    ];

    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages,
        max_tokens: MAX_TOKENS,
        temperature: 0,
        response_format: { type: 'json_object' }
      },
      { signal: request.signal }
    );

    return response.choices[0]?.message?.content ?? '';
  }
}

/**
 * Google Gemini backend using the Generative AI SDK.
 */
export class GeminiJudgeBackend implements JudgeBackend {
  readonly provider = 'gemini' as const;
  readonly model: string;
  private client: GoogleGenerativeAI;

  constructor(apiKey: string, model?: string) {
    this.client = new GoogleGenerativeAI(apiKey);
    this.model = model ?? 'gemini-2.0-flash';
  }

  async complete(request: CompletionRequest): Promise<string> {
    const genModel = this.client.getGenerativeModel({
      model: this.model,
      systemInstruction: request.system,
      generationConfig: {
        maxOutputTokens: MAX_TOKENS,
        temperature: 0,
        responseMimeType: 'application/json'
      }
    });

    const result = await genModel.generateContent(request.prompt, { signal: request.signal });
    return result.response.text();
  }
}
