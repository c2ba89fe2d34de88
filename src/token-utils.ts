import type { LLMHandle, TokenUsage } from "./llms/types.js";
import type { DualAgentTelemetry } from "./telemetry.js";
import { isRecord } from "./llms/utils.js";

function numberField(source: Record<string, unknown>, ...keys: string[]): number | undefined {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === "number" && Number.isFinite(value)) return value;
  }
  return undefined;
}

// Handles OpenAI-compatible (Groq) and Gemini usageMetadata formats
export function normalizeTokenUsage(usage: unknown): TokenUsage | null {
  if (!isRecord(usage)) return null;

  if (usage.promptTokenCount !== undefined || usage.candidatesTokenCount !== undefined) {
    const inputTokens = numberField(usage, "promptTokenCount") ?? 0;
    const outputTokens = numberField(usage, "candidatesTokenCount") ?? 0;
    return {
      inputTokens,
      outputTokens,
      totalTokens: numberField(usage, "totalTokenCount") ?? inputTokens + outputTokens,
    };
  }

  const inputTokens = numberField(usage, "inputTokens", "input_tokens", "prompt_tokens") ?? 0;
  const outputTokens = numberField(usage, "outputTokens", "output_tokens", "completion_tokens") ?? 0;
  const totalTokens = numberField(usage, "totalTokens", "total_tokens") ?? inputTokens + outputTokens;

  return {
    inputTokens,
    outputTokens,
    totalTokens
  };
}

export function recordTokenMetrics(
  telemetry: DualAgentTelemetry | undefined,
  usage: TokenUsage | null,
  attributes: { provider: string; model: string; agent: string }
): void {
  if (!usage || !telemetry) return;

  if (usage.inputTokens) {
    telemetry.recordMetric('llm.tokens.input', usage.inputTokens, attributes);
  }
  if (usage.outputTokens) {
    telemetry.recordMetric('llm.tokens.output', usage.outputTokens, attributes);
  }
  if (usage.totalTokens) {
    telemetry.recordMetric('llm.tokens.total', usage.totalTokens, attributes);
  }
}

export function getLLMProviderId(llm: Pick<LLMHandle, 'id' | 'model'>): string {
  return llm.id || llm.model || 'unknown';
}
