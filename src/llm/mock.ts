/**
 * MockLLMBackend - canned responses for tests, no network.
 */

import type { LLMBackend, LLMOptions, LLMResponse, Message } from './types';

export interface MockResponse {
  content: string;
}

export class MockLLMBackend implements LLMBackend {
  totalApiCalls = 0;

  /** Every message list passed to `call`/`callRaw`, in order. */
  readonly calls: Message[][] = [];

  private responses: MockResponse[];
  private responseIndex = 0;
  private defaultResponse: MockResponse;

  /**
   * @param responses - Returned in order, one per call
   * @param defaultResponse - Used once `responses` is exhausted
   */
  constructor(
    responses: MockResponse[] = [],
    defaultResponse: MockResponse = { content: '{"success": false, "reason": "mock"}' }
  ) {
    this.responses = responses;
    this.defaultResponse = defaultResponse;
  }

  async call(messages: Message[], options?: LLMOptions): Promise<string> {
    return (await this.callRaw(messages, options)).text;
  }

  async callRaw(messages: Message[], _options?: LLMOptions): Promise<LLMResponse> {
    this.totalApiCalls++;
    this.calls.push(messages);

    const response = this.responseIndex < this.responses.length
      ? this.responses[this.responseIndex++]
      : this.defaultResponse;

    return { text: response.content };
  }

  reset(): void {
    this.responseIndex = 0;
    this.totalApiCalls = 0;
    this.calls.length = 0;
  }

  addResponses(responses: MockResponse[]): void {
    this.responses.push(...responses);
  }
}
