import { context, metrics, SpanStatusCode, trace } from '@opentelemetry/api';
import type { Attributes, Counter, Histogram, Meter, Span, Tracer } from '@opentelemetry/api';
import type { AgentRole } from './errors.js';
import { errorMessage } from './errors.js';
import type { CompletionRequest, LLMHandle } from './llms/types.js';
import { getLLMProviderId, recordTokenMetrics } from './token-utils.js';
import { DEFAULT_TELEMETRY_SERVICE_NAME, DUAL_AGENT_VERSION } from './constants.js';

export type DualAgentTelemetryConfig = {
  serviceName?: string;
  tracer?: Tracer;
  meter?: Meter;
  traces?: boolean;
  metrics?: boolean;
};

export type MetricName =
  | 'agent.duration'
  | 'llm.call'
  | 'llm.duration'
  | 'llm.tokens.input'
  | 'llm.tokens.output'
  | 'llm.tokens.total'
  | 'tool.call'
  | 'tool.duration'
  | 'error';

export type DualAgentTelemetry = {
  startRunSpan: (topic: string) => Span | null;
  startAgentSpan: (parent: Span | null, agent: AgentRole, model?: string) => Span | null;
  startLLMSpan: (parent: Span | null, llm: Pick<LLMHandle, 'id' | 'model'>, request: CompletionRequest) => Span | null;
  startToolSpan: (parent: Span | null, toolName: string) => Span | null;
  endSpan: (span: Span | null, error?: unknown) => void;
  recordMetric: (name: MetricName, value: number, attributes?: Attributes) => void;
};

const METRIC_DEFINITIONS: Array<{ name: MetricName; type: 'counter' | 'histogram'; description: string; unit: string }> = [
  { name: 'agent.duration', type: 'histogram', description: 'Agent duration', unit: 'ms' },
  { name: 'llm.call', type: 'counter', description: 'Total LLM API calls', unit: 'calls' },
  { name: 'llm.duration', type: 'histogram', description: 'LLM API call duration', unit: 'ms' },
  { name: 'llm.tokens.input', type: 'counter', description: 'Input tokens sent to LLM', unit: 'tokens' },
  { name: 'llm.tokens.output', type: 'counter', description: 'Output tokens generated by LLM', unit: 'tokens' },
  { name: 'llm.tokens.total', type: 'counter', description: 'Total tokens (input + output)', unit: 'tokens' },
  { name: 'tool.call', type: 'counter', description: 'Total tool calls', unit: 'calls' },
  { name: 'tool.duration', type: 'histogram', description: 'Tool call duration', unit: 'ms' },
  { name: 'error', type: 'counter', description: 'Total errors by type', unit: 'errors' },
];

// Counters that always count one occurrence regardless of the value passed
const OCCURRENCE_COUNTERS = new Set<MetricName>(['llm.call', 'tool.call', 'error']);

type Instrument = { type: 'counter'; counter: Counter } | { type: 'histogram'; histogram: Histogram };

export function createDualAgentTelemetry(config: DualAgentTelemetryConfig = {}): DualAgentTelemetry {
  const serviceName = config.serviceName || DEFAULT_TELEMETRY_SERVICE_NAME;
  const tracer = config.tracer ?? (config.traces !== false ? trace.getTracer(serviceName, DUAL_AGENT_VERSION) : null);
  const meter = config.meter ?? (config.metrics !== false ? metrics.getMeter(serviceName, DUAL_AGENT_VERSION) : null);

  const registry = new Map<MetricName, Instrument>();
  if (meter) {
    for (const def of METRIC_DEFINITIONS) {
      const fullName = `dual_agent.${def.name}`;
      registry.set(def.name, def.type === 'counter'
        ? { type: 'counter', counter: meter.createCounter(fullName, { description: def.description, unit: def.unit }) }
        : { type: 'histogram', histogram: meter.createHistogram(fullName, { description: def.description, unit: def.unit }) });
    }
  }

  function startChild(name: string, parent: Span | null, attributes: Attributes): Span | null {
    if (!tracer) return null;
    const ctx = parent ? trace.setSpan(context.active(), parent) : undefined;
    return tracer.startSpan(name, { attributes }, ctx);
  }

  return {
    startRunSpan(topic: string): Span | null {
      return startChild('dual_agent.run', null, {
        'run.topic_length': topic.length,
        'dual_agent.version': DUAL_AGENT_VERSION,
      });
    },

    startAgentSpan(parent, agent, model): Span | null {
      const attrs: Attributes = { 'agent.role': agent };
      if (model) attrs['llm.model'] = model;
      return startChild(`agent.${agent}`, parent, attrs);
    },

    startLLMSpan(parent, llm, request): Span | null {
      return startChild('llm.generate', parent, {
        'llm.provider': getLLMProviderId(llm),
        'llm.model': llm.model,
        'llm.prompt_length': request.systemPrompt.length + request.userContent.length,
      });
    },

    startToolSpan(parent, toolName): Span | null {
      return startChild('tool.call', parent, { 'tool.name': toolName });
    },

    endSpan(span, error): void {
      if (!span) return;
      if (error !== undefined) {
        span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage(error) });
        if (error instanceof Error) span.recordException(error);
      } else {
        span.setStatus({ code: SpanStatusCode.OK });
      }
      span.end();
    },

    recordMetric(name, value, attributes = {}): void {
      const instrument = registry.get(name);
      if (!instrument) return;
      if (instrument.type === 'histogram') {
        instrument.histogram.record(value, attributes);
      } else {
        instrument.counter.add(OCCURRENCE_COUNTERS.has(name) ? 1 : value, attributes);
      }
    },
  };
}

// No-op telemetry (when not configured)
export const noopTelemetry: DualAgentTelemetry = {
  startRunSpan: () => null,
  startAgentSpan: () => null,
  startLLMSpan: () => null,
  startToolSpan: () => null,
  endSpan: () => {},
  recordMetric: () => {},
};

/**
 * Run one LLM call inside an `llm.generate` span, recording call count,
 * latency and token usage.
 */
export async function traceLLMCall<T>(
  telemetry: DualAgentTelemetry,
  parent: Span | null,
  llm: LLMHandle,
  agent: AgentRole,
  request: CompletionRequest,
  call: () => Promise<T>
): Promise<T> {
  const span = telemetry.startLLMSpan(parent, llm, request);
  const provider = getLLMProviderId(llm);
  const started = Date.now();
  try {
    const result = await call();
    telemetry.recordMetric('llm.call', 1, { provider, agent, error: false });
    telemetry.recordMetric('llm.duration', Date.now() - started, { provider, model: llm.model, agent });
    recordTokenMetrics(telemetry, llm.getUsage?.() ?? null, { provider, model: llm.model, agent });
    telemetry.endSpan(span);
    return result;
  } catch (e) {
    telemetry.recordMetric('llm.call', 1, { provider, agent, error: true });
    telemetry.recordMetric('error', 1, { type: 'llm', agent });
    // Provider messages can echo credentials; only the agent span carries the redacted text
    telemetry.endSpan(span, e instanceof Error ? e.name : 'LLM call failed');
    throw e;
  }
}
