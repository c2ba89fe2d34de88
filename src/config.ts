import { z } from 'zod';
import {
  DEFAULT_PROACTIVE_MODEL,
  DEFAULT_PROACTIVE_TEMPERATURE,
  DEFAULT_REACTIVE_MODEL,
  DEFAULT_REACTIVE_TEMPERATURE,
  DEFAULT_SERVER_HOST,
  DEFAULT_SERVER_PORT,
  DEFAULT_TELEMETRY_SERVICE_NAME,
} from './constants.js';
import type { ProviderConfig, SearchConfig } from './types.js';

const ServerEnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_SERVER_PORT),
  HOST: z.string().min(1).default(DEFAULT_SERVER_HOST),
  DUAL_AGENT_DEBUG: z.enum(['true', 'false', '1', '0']).optional(),
  OTEL_SERVICE_NAME: z.string().min(1).default(DEFAULT_TELEMETRY_SERVICE_NAME),
});

export type ServerConfig = {
  port: number;
  host: string;
  debug: boolean;
  serviceName: string;
};

/**
 * Read server settings from the environment. API keys are never taken from
 * here; they arrive with each request.
 *
 * @throws Error listing every invalid variable
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = ServerEnvSchema.safeParse({
    PORT: env.PORT || undefined,
    HOST: env.HOST || undefined,
    DUAL_AGENT_DEBUG: env.DUAL_AGENT_DEBUG || undefined,
    OTEL_SERVICE_NAME: env.OTEL_SERVICE_NAME || undefined,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid server configuration: ${issues}`);
  }
  const cfg = parsed.data;
  return {
    port: cfg.PORT,
    host: cfg.HOST,
    debug: cfg.DUAL_AGENT_DEBUG === 'true' || cfg.DUAL_AGENT_DEBUG === '1',
    serviceName: cfg.OTEL_SERVICE_NAME,
  };
}

// Keys pasted from dashboards often carry whitespace or quotes
export function sanitizeKey(value: string | undefined): string {
  if (!value) return '';
  return value.trim().replace(/^"+|"+$/g, '').replace(/^'+|'+$/g, '');
}

const AgentSettingsSchema = z.object({
  apiKey: z.string().optional(),
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(1).optional(),
});

export const RunRequestSchema = z.object({
  topic: z.string().optional(),
  reactive: AgentSettingsSchema.optional(),
  proactive: AgentSettingsSchema.optional(),
  search: z
    .object({
      enabled: z.boolean().optional(),
      apiKey: z.string().optional(),
    })
    .optional(),
});

export type RunRequest = z.infer<typeof RunRequestSchema>;

export type ResolvedRun = {
  topic: string;
  reactive: ProviderConfig;
  proactive: ProviderConfig;
  search: SearchConfig;
};

export const MISSING_TOPIC_MESSAGE = 'Please enter a content idea to run the agents.';
export const MISSING_KEYS_MESSAGE = 'Please ensure all necessary API keys are provided.';

/**
 * Turn a parsed request into runner inputs, filling model and temperature
 * defaults.
 *
 * @returns the inputs, or the message to show when something required is missing
 */
export function resolveRunRequest(body: RunRequest): { ok: true; value: ResolvedRun } | { ok: false; message: string } {
  const topic = body.topic?.trim() ?? '';
  if (!topic) return { ok: false, message: MISSING_TOPIC_MESSAGE };

  const reactiveKey = sanitizeKey(body.reactive?.apiKey);
  const proactiveKey = sanitizeKey(body.proactive?.apiKey);
  const searchEnabled = body.search?.enabled ?? false;
  const searchKey = sanitizeKey(body.search?.apiKey);
  if (!reactiveKey || !proactiveKey || (searchEnabled && !searchKey)) {
    return { ok: false, message: MISSING_KEYS_MESSAGE };
  }

  return {
    ok: true,
    value: {
      topic,
      reactive: {
        apiKey: reactiveKey,
        model: body.reactive?.model ?? DEFAULT_REACTIVE_MODEL,
        temperature: body.reactive?.temperature ?? DEFAULT_REACTIVE_TEMPERATURE,
      },
      proactive: {
        apiKey: proactiveKey,
        model: body.proactive?.model ?? DEFAULT_PROACTIVE_MODEL,
        temperature: body.proactive?.temperature ?? DEFAULT_PROACTIVE_TEMPERATURE,
      },
      search: searchEnabled ? { enabled: true, apiKey: searchKey } : { enabled: false },
    },
  };
}
