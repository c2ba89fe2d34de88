import type { CompletionRequest } from './llms/types.js';
import type { ObservabilityOptions, ProviderConfig, ProviderFactory } from './types.js';
import { llmGroq } from './llms/groq.js';
import { errorMessage, redactSecrets } from './errors.js';
import { defaultLogger } from './logger.js';
import { noopTelemetry, traceLLMCall } from './telemetry.js';

export const HEALTH_CHECK_REQUEST: CompletionRequest = {
  systemPrompt: 'You are a health check.',
  userContent: 'Reply with OK',
  temperature: 0,
};

export const defaultReactiveProvider: ProviderFactory = (cfg) =>
  llmGroq({ apiKey: cfg.apiKey, model: cfg.model, options: { temperature: cfg.temperature } });

export type ValidateOptions = ObservabilityOptions & {
  provider?: ProviderFactory;
};

/**
 * Confirm that an API key can reach the given model with one minimal call.
 * The reply is not inspected.
 *
 * @returns `undefined` when the call succeeds, otherwise a readable failure message
 */
export async function validateCredentials(config: ProviderConfig, opts: ValidateOptions = {}): Promise<string | undefined> {
  const logger = opts.logger ?? defaultLogger;
  const telemetry = opts.telemetry ?? noopTelemetry;
  const factory = opts.provider ?? defaultReactiveProvider;

  try {
    const llm = factory({ ...config, temperature: 0 });
    await traceLLMCall(telemetry, opts.parentSpan ?? null, llm, 'reactive', HEALTH_CHECK_REQUEST, () => llm.gen(HEALTH_CHECK_REQUEST));
    logger.debug(`Health check passed for model '${config.model}'`);
    return undefined;
  } catch (e) {
    const message = redactSecrets(errorMessage(e), [config.apiKey]) || 'Health check failed';
    logger.warn(`Health check failed for model '${config.model}': ${message}`);
    return message;
  }
}
