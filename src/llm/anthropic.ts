import { z } from 'zod';
import { DEFAULT_TEMPERATURE, type ChatOptions, type LLMAdapter, type LLMConfig } from './types.js';
import type { Message, LLMEvent } from '../types/shared.js';

const MessagesResponseSchema = z.object({
  content: z.array(z.object({
    type: z.string(),
    text: z.string().optional(),
  })).default([]),
  usage: z.object({
    input_tokens: z.number(),
    output_tokens: z.number(),
  }).optional(),
});

export class AnthropicAdapter implements LLMAdapter {
  provider = 'anthropic';
  private config: LLMConfig;

  constructor(config: LLMConfig) {
    this.config = config;
  }

  async *chat(messages: Message[], opts: ChatOptions = {}): AsyncIterable<LLMEvent> {
    const baseUrl = this.config.baseUrl || 'https://api.anthropic.com/v1';
    const systemMsg = messages.find(m => m.role === 'system');
    const nonSystemMsgs = messages.filter(m => m.role !== 'system');

    const body: Record<string, unknown> = {
      model: this.config.model,
      max_tokens: 8192,
      temperature: DEFAULT_TEMPERATURE,
      messages: nonSystemMsgs.map(m => ({ role: m.role, content: m.content })),
    };
    if (systemMsg) body.system = systemMsg.content;

    const res = await fetch(`${baseUrl}/messages`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.config.apiKey,
        'anthropic-version': '2023-06-01',
      },
      body: JSON.stringify(body),
      signal: opts.signal,
    });

    if (!res.ok) {
      yield { type: 'error', error: `Anthropic API error: ${res.status} ${await res.text()}` };
      return;
    }

    const parsed = MessagesResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      yield { type: 'error', error: `Unexpected Anthropic response: ${parsed.error.message}` };
      return;
    }
    for (const block of parsed.data.content) {
      if (block.type === 'text' && block.text) {
        yield { type: 'text_delta', content: block.text };
      }
    }
    yield { type: 'done', usage: parsed.data.usage };
  }
}
