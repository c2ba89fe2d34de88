import { describe, it, expect, vi } from 'vitest';
import { validateCredentials, HEALTH_CHECK_REQUEST } from '../src/validator.js';
import type { CompletionRequest, LLMHandle } from '../src/llms/types.js';
import type { ProviderConfig } from '../src/types.js';
import { silentLogger } from '../src/logger.js';

const config: ProviderConfig = { apiKey: 'test-secret', model: 'llama-3.1-8b-instant', temperature: 0.3 };

function fakeLlm(gen: (request: CompletionRequest) => Promise<string>): LLMHandle {
  return {
    id: 'Fake-llm',
    model: 'fake',
    gen,
    genWithTools: async () => ({ toolCalls: [] }),
  };
}

describe('validateCredentials', () => {
  it('returns undefined after one health-check call at temperature 0', async () => {
    const requests: CompletionRequest[] = [];
    const seen: ProviderConfig[] = [];
    const provider = (cfg: ProviderConfig) => {
      seen.push(cfg);
      return fakeLlm(async (request) => {
        requests.push(request);
        return 'anything at all';
      });
    };

    expect(await validateCredentials(config, { provider, logger: silentLogger })).toBeUndefined();
    expect(seen).toEqual([{ apiKey: 'test-secret', model: 'llama-3.1-8b-instant', temperature: 0 }]);
    expect(requests).toEqual([HEALTH_CHECK_REQUEST]);
    expect(HEALTH_CHECK_REQUEST).toEqual({ systemPrompt: 'You are a health check.', userContent: 'Reply with OK', temperature: 0 });
  });

  it('returns the provider message without the key', async () => {
    const warn = vi.fn();
    const provider = () => fakeLlm(async () => {
      throw new Error('Invalid API Key provided: test-secret');
    });

    const message = await validateCredentials(config, { provider, logger: { ...silentLogger, warn } });

    expect(message).toBe('Invalid API Key provided: ***');
    expect(warn).toHaveBeenCalledWith("Health check failed for model 'llama-3.1-8b-instant': Invalid API Key provided: ***");
  });

  it('never throws when the handle cannot be built', async () => {
    const provider = (): LLMHandle => {
      throw new Error("llmGroq: Missing required 'model' parameter.");
    };
    expect(await validateCredentials(config, { provider, logger: silentLogger }))
      .toBe("llmGroq: Missing required 'model' parameter.");
  });

  it('falls back to a generic message when the error text is empty', async () => {
    const provider = () => fakeLlm(async () => {
      throw '';
    });
    expect(await validateCredentials(config, { provider, logger: silentLogger })).toBe('Health check failed');
  });
});
