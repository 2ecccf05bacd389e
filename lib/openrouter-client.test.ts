import { afterEach, describe, expect, it, vi } from 'vitest';
import { LanguageModelError } from './errors';
import { OpenRouterClient } from './openrouter-client';

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

afterEach(() => {
  vi.restoreAllMocks();
});

describe('OpenRouterClient', () => {
  it('posts a non-streaming completion request', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse({ choices: [{ message: { content: 'From the docs [1]' }, finish_reason: 'stop' }] }),
    );
    const client = new OpenRouterClient({ apiKey: 'test-key', model: 'openai/gpt-4o-mini', fetch: fetchMock });

    const answer = await client.complete([
      { role: 'system', content: 'Context' },
      { role: 'user', content: '   ' },
      { role: 'user', content: 'Question?' },
    ]);

    expect(answer).toBe('From the docs [1]');
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://openrouter.ai/api/v1/chat/completions');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-key' });
    expect(JSON.parse(String(init?.body))).toMatchObject({
      model: 'openai/gpt-4o-mini',
      stream: false,
      messages: [
        { role: 'system', content: 'Context' },
        { role: 'user', content: 'Question?' },
      ],
    });
  });

  it('raises on error statuses', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const client = new OpenRouterClient({
      apiKey: 'test-key',
      fetch: async () => new Response('rate limited', { status: 429, statusText: 'Too Many Requests' }),
    });

    await expect(client.complete([{ role: 'user', content: 'Hi' }])).rejects.toThrow(
      new LanguageModelError('OpenRouter API error: 429 Too Many Requests'),
    );
  });

  it('raises on a malformed body', async () => {
    const client = new OpenRouterClient({ apiKey: 'test-key', fetch: async () => new Response('<html>') });

    await expect(client.complete([{ role: 'user', content: 'Hi' }])).rejects.toThrow(
      'OpenRouter returned a malformed response body',
    );
  });

  it('times out while the body is still arriving', async () => {
    const client = new OpenRouterClient({
      apiKey: 'test-key',
      timeoutMs: 20,
      fetch: async (_url, init) => {
        const body = new ReadableStream<Uint8Array>({
          start(controller) {
            controller.enqueue(new TextEncoder().encode('{"choices": ['));
            init?.signal?.addEventListener('abort', () => controller.error(new Error('aborted')));
          },
        });
        return new Response(body);
      },
    });

    await expect(client.complete([{ role: 'user', content: 'Hi' }])).rejects.toThrow('OpenRouter response timed out');
  });

  it('refuses to send only empty messages', async () => {
    const fetchMock = vi.fn<typeof fetch>();
    const client = new OpenRouterClient({ apiKey: 'test-key', fetch: fetchMock });

    await expect(client.complete([{ role: 'user', content: ' ' }])).rejects.toBeInstanceOf(LanguageModelError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
