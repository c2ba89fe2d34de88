import type { CompletionRequest } from '../llms/types.js';
import type { ObservabilityOptions, ProviderConfig, ProviderFactory } from '../types.js';
import { CredentialError, normalizeProviderError } from '../errors.js';
import { defaultReactiveProvider, validateCredentials } from '../validator.js';
import { defaultLogger } from '../logger.js';
import { noopTelemetry, traceLLMCall } from '../telemetry.js';
import { getLLMProviderId } from '../token-utils.js';

export const REACTIVE_SYSTEM_PROMPT =
  "You are a fast, reactive content drafting agent. Your sole purpose is to " +
  "generate a concise, direct, and engaging draft in response to the user's request. " +
  "Do not overthink or use external tools. Focus on speed and a clear structure. " +
  "The user will provide a topic or idea. Your output should be a draft of a short social media post or a blog outline.";

export type DraftOptions = ObservabilityOptions & {
  provider?: ProviderFactory;
  // Run the credential health check before drafting (default true)
  validate?: boolean;
};

/**
 * Produce a quick draft for a topic with a single tool-free completion.
 *
 * @throws CredentialError when the health check fails
 * @throws ProviderCallError when the drafting call fails
 */
export async function draft(topic: string, config: ProviderConfig, opts: DraftOptions = {}): Promise<string> {
  const logger = opts.logger ?? defaultLogger;
  const telemetry = opts.telemetry ?? noopTelemetry;
  const factory = opts.provider ?? defaultReactiveProvider;
  const parentSpan = opts.parentSpan ?? null;

  if (opts.validate !== false) {
    const err = await validateCredentials(config, { provider: factory, logger, telemetry, parentSpan });
    if (err) {
      throw new CredentialError(`API key or model '${config.model}' is invalid: ${err}`, { agent: 'reactive', retryable: false });
    }
  }

  const request: CompletionRequest = {
    systemPrompt: REACTIVE_SYSTEM_PROMPT,
    userContent: topic,
    temperature: config.temperature,
  };

  let provider: string | undefined;
  try {
    const llm = factory(config);
    provider = getLLMProviderId(llm);
    logger.debug(`Reactive draft via ${provider}`);
    return await traceLLMCall(telemetry, parentSpan, llm, 'reactive', request, () => llm.gen(request));
  } catch (e) {
    throw normalizeProviderError(e, { agent: 'reactive', provider });
  }
}
