import OpenAI from 'openai';
import type { LLMClient, LLMMessage, LLMOptions, LLMResponse } from './llm.types';

export class OpenAIChatClient implements LLMClient {
  private openai: OpenAI;

  constructor(apiKey: string) {
    // One attempt per request; failures surface to the caller.
    this.openai = new OpenAI({ apiKey, maxRetries: 0 });
  }

  async chat(messages: LLMMessage[], options: LLMOptions): Promise<LLMResponse> {
    const completion = await this.openai.chat.completions.create({
      model: options.model,
      messages: messages.map((m) => ({ role: m.role, content: m.content })),
      temperature: options.temperature,
    });

    return {
      content: completion.choices[0]?.message?.content ?? '',
      usage: {
        promptTokens: completion.usage?.prompt_tokens ?? 0,
        completionTokens: completion.usage?.completion_tokens ?? 0,
      },
    };
  }
}
