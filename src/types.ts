import type { Span } from '@opentelemetry/api';
import type { LLMHandle } from './llms/types.js';
import type { DualAgentError } from './errors.js';
import type { Logger } from './logger.js';
import type { DualAgentTelemetry } from './telemetry.js';

/** Credentials and sampling settings for one hosted model. Request-scoped, never persisted. */
export type ProviderConfig = {
  apiKey: string;
  model: string;
  temperature: number;
};

export type SearchConfig = {
  enabled: boolean;
  apiKey?: string;
  maxResults?: number;
};

export type ProviderFactory = (cfg: ProviderConfig) => LLMHandle;

export type Result<T, E = DualAgentError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/** Options shared by every component that talks to a provider. */
export type ObservabilityOptions = {
  logger?: Logger;
  telemetry?: DualAgentTelemetry;
  parentSpan?: Span | null;
};
