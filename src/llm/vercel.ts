/**
 * VercelAIBackend - LLM backend using the Vercel AI SDK.
 *
 * Providers:
 * - OpenAI
 * - Anthropic
 * - OpenAI-compatible (Groq, Together, Cerebras, etc.) via a base URL
 */

import { generateText, type CoreMessage, type LanguageModel } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import { ConfigError } from '../errors';
import type { LLMBackend, LLMBackendConfig, LLMOptions, LLMResponse, Message } from './types';

// Known base URLs for OpenAI-compatible providers
const PROVIDER_BASE_URLS: Record<string, string> = {
  cerebras: 'https://api.cerebras.ai/v1',
  groq: 'https://api.groq.com/openai/v1',
  together: 'https://api.together.xyz/v1',
  fireworks: 'https://api.fireworks.ai/inference/v1',
  deepseek: 'https://api.deepseek.com/v1',
  mistral: 'https://api.mistral.ai/v1',
};

export class VercelAIBackend implements LLMBackend {
  totalApiCalls = 0;

  private model: LanguageModel;

  constructor(config: LLMBackendConfig) {
    this.model = this.createModel(config);
  }

  private createModel(config: LLMBackendConfig): LanguageModel {
    const { provider, name: modelName, apiKey, baseURL } = config;
    const providerLower = provider.toLowerCase();
    const providerUpper = provider.toUpperCase();

    const resolvedApiKey = apiKey ?? process.env[`${providerUpper}_API_KEY`];
    const resolvedBaseURL = baseURL ?? process.env[`${providerUpper}_BASE_URL`] ?? PROVIDER_BASE_URLS[providerLower];

    if (providerLower === 'openai') {
      const openai = createOpenAI({ apiKey: resolvedApiKey, baseURL });
      return openai.chat(modelName);
    }

    if (providerLower === 'anthropic') {
      const anthropic = createAnthropic({ apiKey: resolvedApiKey, baseURL });
      return anthropic(modelName);
    }

    if (!resolvedBaseURL) {
      throw new ConfigError(
        `Unknown provider "${provider}". Set ${providerUpper}_BASE_URL environment variable.`
      );
    }

    const compatible = createOpenAICompatible({
      name: providerLower,
      baseURL: resolvedBaseURL,
      headers: resolvedApiKey ? { Authorization: `Bearer ${resolvedApiKey}` } : undefined,
    });

    return compatible(modelName);
  }

  async call(messages: Message[], options?: LLMOptions): Promise<string> {
    return (await this.callRaw(messages, options)).text;
  }

  async callRaw(messages: Message[], options?: LLMOptions): Promise<LLMResponse> {
    this.totalApiCalls++;

    const system = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');
    const conversation: CoreMessage[] = messages.flatMap((m): CoreMessage[] => {
      if (m.role === 'user') return [{ role: 'user', content: m.content }];
      if (m.role === 'assistant') return [{ role: 'assistant', content: m.content }];
      return [];
    });

    const response = await generateText({
      model: this.model,
      system: system || undefined,
      messages: conversation,
      temperature: options?.temperature,
      maxTokens: options?.max_tokens,
      topP: options?.top_p,
    });

    return {
      text: response.text,
      usage: {
        promptTokens: response.usage.promptTokens,
        completionTokens: response.usage.completionTokens,
      },
    };
  }
}
