import { describe, it, expect, vi, afterEach } from 'vitest';
import { llmGemini } from '../../src/llms/gemini.js';
import type { GeminiGenerateParams } from '../../src/llms/gemini.js';
import { ProviderCallError } from '../../src/errors.js';

function mockClient(response: unknown) {
  const calls: GeminiGenerateParams[] = [];
  const generateContent = vi.fn(async (params: GeminiGenerateParams) => {
    calls.push(params);
    return response;
  });
  return { client: { generateContent }, calls };
}

describe('Gemini provider (unit)', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('requires a model', () => {
    expect(() => llmGemini({ apiKey: 'test-secret', model: '' })).toThrow(/Missing required 'model'/);
  });

  it('builds systemInstruction, contents with model role and temperature', async () => {
    const { client, calls } = mockClient({ candidates: [{ content: { parts: [{ text: 'Analysis' }, { text: ' done' }] } }] });
    const llm = llmGemini({ apiKey: 'test-secret', model: 'gemini-2.5-flash', client });

    const out = await llm.gen({
      systemPrompt: 'Refine.',
      userContent: 'DRAFT to refine: x',
      history: [{ role: 'assistant', content: 'earlier' }],
      temperature: 0.7,
    });

    expect(out).toBe('Analysis done');
    expect(llm.id).toBe('Gemini-gemini-2.5-flash');
    expect(calls[0]).toEqual({
      systemInstruction: { parts: [{ text: 'Refine.' }] },
      contents: [
        { role: 'model', parts: [{ text: 'earlier' }] },
        { role: 'user', parts: [{ text: 'DRAFT to refine: x' }] },
      ],
      generationConfig: { temperature: 0.7 },
    });
  });

  it('maps generation options to camelCase config keys', async () => {
    const { client, calls } = mockClient({ candidates: [] });
    const llm = llmGemini({
      apiKey: 'test-secret',
      model: 'gemini-2.5-pro',
      client,
      options: { temperature: 0.2, max_output_tokens: 256, top_p: 0.9, top_k: 40, stop_sequences: ['END'] },
    });

    expect(await llm.gen({ systemPrompt: 's', userContent: 'u' })).toBe('');
    expect(calls[0].generationConfig).toEqual({
      temperature: 0.2,
      maxOutputTokens: 256,
      topP: 0.9,
      topK: 40,
      stopSequences: ['END'],
    });
  });

  it('sends function declarations without JSON Schema meta keys and maps calls back', async () => {
    const { client, calls } = mockClient({
      candidates: [{
        content: {
          parts: [
            { text: 'Looking that up.' },
            { functionCall: { name: 'web_search', args: { query: 'serverless market size' } } },
          ],
        },
      }],
      usageMetadata: { promptTokenCount: 20, candidatesTokenCount: 5, totalTokenCount: 25 },
    });
    const llm = llmGemini({ apiKey: 'test-secret', model: 'gemini-2.5-flash', client });

    const res = await llm.genWithTools({ systemPrompt: 's', userContent: 'u' }, [{
      name: 'web_search',
      description: 'Search the web',
      parameters: {
        type: 'object',
        properties: { query: { type: 'string' } },
        required: ['query'],
        additionalProperties: false,
      },
    }]);

    expect(calls[0].tools).toEqual([{
      functionDeclarations: [{
        name: 'web_search',
        description: 'Search the web',
        parameters: { type: 'object', properties: { query: { type: 'string' } }, required: ['query'] },
      }],
    }]);
    expect(res).toEqual({
      content: 'Looking that up.',
      toolCalls: [{ name: 'web_search', arguments: { query: 'serverless market size' } }],
      usage: { inputTokens: 20, outputTokens: 5, totalTokens: 25 },
    });
  });

  it('leaves tools out when none are given', async () => {
    const { client, calls } = mockClient({ candidates: [{ content: { parts: [{ text: 'ok' }] } }] });
    const llm = llmGemini({ apiKey: 'test-secret', model: 'gemini-2.5-flash', client });

    const res = await llm.genWithTools({ systemPrompt: 's', userContent: 'u' }, []);

    expect(calls[0].tools).toBeUndefined();
    expect(res.toolCalls).toEqual([]);
    expect(res.content).toBe('ok');
  });

  it('rejects a response that does not match the expected shape', async () => {
    const { client } = mockClient({ candidates: 'nope' });
    const llm = llmGemini({ apiKey: 'test-secret', model: 'gemini-2.5-flash', client });

    const err = await llm.gen({ systemPrompt: 's', userContent: 'u' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderCallError);
    expect(err instanceof ProviderCallError && err.meta.retryable).toBe(false);
  });

  it('calls generateContent over fetch with the key in a header', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(
      JSON.stringify({ candidates: [{ content: { parts: [{ text: 'from fetch' }] } }] }),
      { status: 200, headers: { 'Content-Type': 'application/json' } },
    ));
    vi.stubGlobal('fetch', fetchMock);

    const llm = llmGemini({ apiKey: 'test-secret', model: 'gemini-2.5-flash' });
    const out = await llm.gen({ systemPrompt: 's', userContent: 'u' });

    expect(out).toBe('from fetch');
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://generativelanguage.googleapis.com/v1beta/models/gemini-2.5-flash:generateContent');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', 'x-goog-api-key': 'test-secret' });
  });

  it('turns a non-ok HTTP response into a ProviderCallError with status', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('quota exceeded', { status: 429 })));

    const llm = llmGemini({ apiKey: 'test-secret', model: 'gemini-2.5-flash' });
    const err = await llm.gen({ systemPrompt: 's', userContent: 'u' }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderCallError);
    if (!(err instanceof ProviderCallError)) return;
    expect(err.message).toBe('Gemini HTTP 429: quota exceeded');
    expect(err.meta).toEqual({ provider: 'Gemini-gemini-2.5-flash', status: 429, retryable: true });
  });
});
