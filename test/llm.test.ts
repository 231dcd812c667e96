import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLLMAdapter } from '../src/llm/factory.js';
import { OpenAIAdapter } from '../src/llm/openai.js';
import { AnthropicAdapter } from '../src/llm/anthropic.js';
import { OllamaAdapter } from '../src/llm/ollama.js';
import type { LLMAdapter } from '../src/llm/types.js';
import type { LLMEvent, Message } from '../src/types/shared.js';

const messages: Message[] = [
  { role: 'system', content: 'be brief' },
  { role: 'user', content: 'hello' },
];

function stubFetch(status: number, body: unknown) {
  const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
    new Response(typeof body === 'string' ? body : JSON.stringify(body), { status }));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

async function collect(adapter: LLMAdapter): Promise<LLMEvent[]> {
  const events: LLMEvent[] = [];
  for await (const e of adapter.chat(messages)) events.push(e);
  return events;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('createLLMAdapter', () => {
  it('picks the adapter for each provider', () => {
    expect(createLLMAdapter({ provider: 'openai', model: 'm', apiKey: 'test-key' })).toBeInstanceOf(OpenAIAdapter);
    expect(createLLMAdapter({ provider: 'anthropic', model: 'm', apiKey: 'test-key' })).toBeInstanceOf(AnthropicAdapter);
    expect(createLLMAdapter({ provider: 'ollama', model: 'm', apiKey: '' })).toBeInstanceOf(OllamaAdapter);
  });
});

describe('OpenAIAdapter', () => {
  it('posts the conversation and yields the reply', async () => {
    const fetchMock = stubFetch(200, {
      choices: [{ message: { content: '{"files": []}' } }],
      usage: { prompt_tokens: 12, completion_tokens: 4 },
    });
    const adapter = new OpenAIAdapter({ provider: 'openai', model: 'gpt-test', apiKey: 'test-key', baseUrl: 'http://llm.local/v1' });

    expect(await collect(adapter)).toEqual([
      { type: 'text_delta', content: '{"files": []}' },
      { type: 'done', usage: { input_tokens: 12, output_tokens: 4 } },
    ]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://llm.local/v1/chat/completions');
    const sent = JSON.parse(String(init.body));
    expect(sent.model).toBe('gpt-test');
    expect(sent.temperature).toBe(0.4);
    expect(sent.messages).toEqual(messages);
  });

  it('reports HTTP failures as error events', async () => {
    stubFetch(401, 'invalid key');
    const adapter = new OpenAIAdapter({ provider: 'openai', model: 'gpt-test', apiKey: 'test-key' });

    expect(await collect(adapter)).toEqual([{ type: 'error', error: 'OpenAI API error: 401 invalid key' }]);
  });

  it('reports a reply without choices', async () => {
    stubFetch(200, { choices: [] });
    const adapter = new OpenAIAdapter({ provider: 'openai', model: 'gpt-test', apiKey: 'test-key' });

    expect(await collect(adapter)).toEqual([{ type: 'error', error: 'No choices in response' }]);
  });
});

describe('AnthropicAdapter', () => {
  it('sends the system prompt separately and joins text blocks', async () => {
    const fetchMock = stubFetch(200, {
      content: [{ type: 'text', text: 'part one ' }, { type: 'tool_use' }, { type: 'text', text: 'part two' }],
      usage: { input_tokens: 7, output_tokens: 3 },
    });
    const adapter = new AnthropicAdapter({ provider: 'anthropic', model: 'claude-test', apiKey: 'test-key' });

    expect(await collect(adapter)).toEqual([
      { type: 'text_delta', content: 'part one ' },
      { type: 'text_delta', content: 'part two' },
      { type: 'done', usage: { input_tokens: 7, output_tokens: 3 } },
    ]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.anthropic.com/v1/messages');
    const sent = JSON.parse(String(init.body));
    expect(sent.system).toBe('be brief');
    expect(sent.messages).toEqual([{ role: 'user', content: 'hello' }]);
  });
});

describe('OllamaAdapter', () => {
  it('asks for a non-streamed reply', async () => {
    const fetchMock = stubFetch(200, { message: { content: 'hi' }, prompt_eval_count: 5, eval_count: 1 });
    const adapter = new OllamaAdapter({ provider: 'ollama', model: 'llama-test', apiKey: '' });

    expect(await collect(adapter)).toEqual([
      { type: 'text_delta', content: 'hi' },
      { type: 'done', usage: { input_tokens: 5, output_tokens: 1 } },
    ]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://localhost:11434/api/chat');
    expect(JSON.parse(String(init.body)).stream).toBe(false);
  });
});
