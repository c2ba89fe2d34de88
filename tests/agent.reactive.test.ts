import { describe, it, expect } from 'vitest';
import { draft, REACTIVE_SYSTEM_PROMPT } from '../src/agents/reactive.js';
import type { CompletionRequest, LLMHandle } from '../src/llms/types.js';
import type { ProviderConfig } from '../src/types.js';
import { CredentialError, ProviderCallError } from '../src/errors.js';
import { silentLogger } from '../src/logger.js';

const config: ProviderConfig = { apiKey: 'test-secret', model: 'llama-3.1-8b-instant', temperature: 0.3 };

function recordingProvider(reply: (request: CompletionRequest) => Promise<string>) {
  const requests: CompletionRequest[] = [];
  const provider = (cfg: ProviderConfig): LLMHandle => ({
    id: 'Fake-llm',
    model: cfg.model,
    gen: async (request) => {
      requests.push(request);
      return reply(request);
    },
    genWithTools: async () => ({ toolCalls: [] }),
  });
  return { provider, requests };
}

describe('draft (reactive agent)', () => {
  it('health-checks, then drafts with the reactive prompt and returns the text verbatim', async () => {
    const { provider, requests } = recordingProvider(async (request) =>
      request.userContent === 'Reply with OK' ? 'OK' : '  Serverless is rising: 3 reasons to care.\n');

    const out = await draft('Serverless is rising.', config, { provider, logger: silentLogger });

    expect(out).toBe('  Serverless is rising: 3 reasons to care.\n');
    expect(requests.length).toBe(2);
    expect(requests[0].userContent).toBe('Reply with OK');
    expect(requests[1]).toEqual({
      systemPrompt: REACTIVE_SYSTEM_PROMPT,
      userContent: 'Serverless is rising.',
      temperature: 0.3,
    });
  });

  it('makes exactly one completion call when validation is skipped', async () => {
    const { provider, requests } = recordingProvider(async () => 'quick draft');

    expect(await draft('Edge AI', config, { provider, validate: false, logger: silentLogger })).toBe('quick draft');
    expect(requests.length).toBe(1);
    expect(requests[0].history).toBeUndefined();
  });

  it('throws CredentialError and skips drafting when the health check fails', async () => {
    const { provider, requests } = recordingProvider(async () => {
      throw new Error('Invalid API Key');
    });

    const err = await draft('Edge AI', config, { provider, logger: silentLogger }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CredentialError);
    if (!(err instanceof CredentialError)) return;
    expect(err.message).toBe("API key or model 'llama-3.1-8b-instant' is invalid: Invalid API Key");
    expect(err.meta).toEqual({ agent: 'reactive', retryable: false });
    expect(requests.length).toBe(1);
  });

  it('wraps drafting failures in ProviderCallError', async () => {
    const { provider } = recordingProvider(async () => {
      throw Object.assign(new Error('Service Unavailable'), { status: 503 });
    });

    const err = await draft('Edge AI', config, { provider, validate: false, logger: silentLogger }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderCallError);
    if (!(err instanceof ProviderCallError)) return;
    expect(err.message).toBe('Service Unavailable');
    expect(err.meta).toEqual({ agent: 'reactive', provider: 'Fake-llm', status: 503, retryable: true });
  });
});
