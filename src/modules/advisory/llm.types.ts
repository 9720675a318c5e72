/**
 * Provider-agnostic chat interface.
 */

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMOptions {
  model: string;
  temperature: number;
}

export interface LLMResponse {
  content: string;
  usage?: { promptTokens: number; completionTokens: number };
}

export interface LLMClient {
  chat(messages: LLMMessage[], options: LLMOptions): Promise<LLMResponse>;
}
