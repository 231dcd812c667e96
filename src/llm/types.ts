import type { Message, LLMEvent } from '../types/shared.js';

export interface ChatOptions {
  signal?: AbortSignal;
}

export interface LLMAdapter {
  provider: string;
  chat(messages: Message[], opts?: ChatOptions): AsyncIterable<LLMEvent>;
}

export interface LLMConfig {
  provider: 'openai' | 'anthropic' | 'ollama';
  model: string;
  apiKey: string;
  baseUrl?: string;
}

export const DEFAULT_TEMPERATURE = 0.4;
