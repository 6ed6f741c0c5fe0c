/**
 * LLM backend types.
 *
 * Evaluators talk to a model only through LLMBackend, so tests can swap in
 * MockLLMBackend.
 */

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMOptions {
  temperature?: number;
  max_tokens?: number;
  top_p?: number;
}

export interface LLMUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface LLMResponse {
  text: string;
  usage?: LLMUsage;
}

export interface LLMBackend {
  /** Total API calls made. */
  totalApiCalls: number;

  /** Call the model and return the content string. */
  call(messages: Message[], options?: LLMOptions): Promise<string>;

  /** Call the model and return text plus token usage, when the provider reports it. */
  callRaw(messages: Message[], options?: LLMOptions): Promise<LLMResponse>;
}

/**
 * Configuration for creating an LLM backend. Missing credentials are read
 * from `<PROVIDER>_API_KEY` and `<PROVIDER>_BASE_URL`.
 */
export interface LLMBackendConfig {
  provider: string;
  name: string;
  apiKey?: string;
  baseURL?: string;
}
