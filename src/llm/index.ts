/**
 * LLM backend exports
 */

export type { LLMBackend, LLMBackendConfig, LLMOptions, LLMResponse, LLMUsage, Message } from './types';
export { VercelAIBackend } from './vercel';
export { MockLLMBackend, type MockResponse } from './mock';
