import { z } from "zod";
import type { CompletionRequest, JSONSchema, LLMHandle, LLMToolResult, TokenUsage, ToolCall, ToolDefinition } from "./types.js";
import { sanitizeToolName } from "./utils.js";
import { normalizeTokenUsage } from "../token-utils.js";
import { ProviderCallError, isRetryableStatus } from "../errors.js";
import { GEMINI_BASE_URL } from "../constants.js";

type GeminiPart = { text: string };

type GeminiContent = {
  role: "user" | "model";
  parts: GeminiPart[];
};

type GeminiFunctionDeclaration = {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
};

export type GeminiGenerateParams = {
  systemInstruction?: { parts: GeminiPart[] };
  contents: GeminiContent[];
  tools?: Array<{ functionDeclarations: GeminiFunctionDeclaration[] }>;
  generationConfig: Record<string, unknown>;
};

type GeminiClient = {
  generateContent: (params: GeminiGenerateParams) => Promise<unknown>;
};

const GeminiResponseSchema = z.object({
  candidates: z.array(z.object({
    content: z.object({
      parts: z.array(z.object({
        text: z.string().optional(),
        functionCall: z.object({
          name: z.string(),
          args: z.record(z.unknown()).optional(),
        }).optional(),
      })).optional(),
    }).optional(),
  })).optional(),
  usageMetadata: z.object({
    promptTokenCount: z.number().optional(),
    candidatesTokenCount: z.number().optional(),
    totalTokenCount: z.number().optional(),
  }).optional(),
});

type GeminiResponse = z.infer<typeof GeminiResponseSchema>;

export type GeminiOptions = {
  temperature?: number;
  max_output_tokens?: number;
  top_p?: number;
  top_k?: number;
  stop_sequences?: string[];
};

export type GeminiConfig = {
  model: string; // Required: "gemini-2.5-flash", "gemini-2.5-pro", etc.
  apiKey: string; // Google AI Studio API key
  baseURL?: string; // Default: "https://generativelanguage.googleapis.com/v1beta"
  client?: GeminiClient;
  options?: GeminiOptions;
};

// Gemini function declarations take an OpenAPI subset; JSON Schema meta keys are rejected
const UNSUPPORTED_SCHEMA_KEYS = ["$schema", "$id", "$ref", "additionalProperties"];

function cleanParameters(schema: JSONSchema): Record<string, unknown> {
  const clean: Record<string, unknown> = { ...schema };
  for (const key of UNSUPPORTED_SCHEMA_KEYS) delete clean[key];
  return clean;
}

export function llmGemini(cfg: GeminiConfig): LLMHandle {
  if (!cfg.model) {
    throw new Error(
      "llmGemini: Missing required 'model' parameter. " +
      "Please specify a Gemini model (e.g., 'gemini-2.5-flash'). " +
      "Example: llmGemini({ model: 'gemini-2.5-flash', apiKey: 'your-api-key' })"
    );
  }
  if (!cfg.apiKey && !cfg.client) {
    throw new Error(
      "llmGemini: Missing required 'apiKey' parameter. " +
      "Please provide a Google AI Studio API key. " +
      "Example: llmGemini({ model: 'gemini-2.5-flash', apiKey: 'your-api-key' })"
    );
  }

  const model = cfg.model;
  const id = `Gemini-${model}`;
  const baseURL = (cfg.baseURL || GEMINI_BASE_URL).replace(/\/$/, "");
  const options = cfg.options || {};
  let lastUsage: TokenUsage | null = null;

  const client: GeminiClient = cfg.client ?? {
    generateContent: async (params) => {
      const response = await fetch(`${baseURL}/models/${encodeURIComponent(model)}:generateContent`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "x-goog-api-key": cfg.apiKey,
        },
        body: JSON.stringify(params),
      });

      if (!response.ok) {
        const text = await response.text().catch(() => "");
        throw new ProviderCallError(
          `Gemini HTTP ${response.status}: ${text.slice(0, 300)}`,
          { provider: id, status: response.status, retryable: isRetryableStatus(response.status) }
        );
      }

      const body: unknown = await response.json();
      return body;
    },
  };

  function buildParams(request: CompletionRequest): GeminiGenerateParams {
    const temperature = request.temperature ?? options.temperature;
    const generationConfig: Record<string, unknown> = {
      ...(temperature !== undefined && { temperature }),
      ...(options.max_output_tokens !== undefined && { maxOutputTokens: options.max_output_tokens }),
      ...(options.top_p !== undefined && { topP: options.top_p }),
      ...(options.top_k !== undefined && { topK: options.top_k }),
      ...(options.stop_sequences && { stopSequences: options.stop_sequences }),
    };

    const contents: GeminiContent[] = (request.history ?? []).map((turn) => ({
      role: turn.role === "assistant" ? "model" : "user",
      parts: [{ text: turn.content }],
    }));
    contents.push({ role: "user", parts: [{ text: request.userContent }] });

    return {
      systemInstruction: { parts: [{ text: request.systemPrompt }] },
      contents,
      generationConfig,
    };
  }

  async function generate(params: GeminiGenerateParams): Promise<GeminiResponse> {
    const raw = await client.generateContent(params);
    const parsed = GeminiResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProviderCallError(`Gemini returned an unexpected response: ${parsed.error.message}`, { provider: id, retryable: false });
    }
    lastUsage = normalizeTokenUsage(parsed.data.usageMetadata);
    return parsed.data;
  }

  return {
    id,
    model,
    async gen(request: CompletionRequest): Promise<string> {
      const resp = await generate(buildParams(request));
      const parts = resp.candidates?.[0]?.content?.parts ?? [];
      return parts.map((part) => part.text ?? "").join("");
    },
    async genWithTools(request: CompletionRequest, tools: ToolDefinition[]): Promise<LLMToolResult> {
      const nameMap = new Map<string, string>();
      const functionDeclarations = tools.map((tool): GeminiFunctionDeclaration => {
        const sanitized = sanitizeToolName(tool.name);
        nameMap.set(sanitized, tool.name);
        return {
          name: sanitized,
          description: tool.description,
          parameters: cleanParameters(tool.parameters),
        };
      });

      const params = buildParams(request);
      if (functionDeclarations.length > 0) {
        params.tools = [{ functionDeclarations }];
      }
      const resp = await generate(params);
      const parts = resp.candidates?.[0]?.content?.parts ?? [];

      const toolCalls: ToolCall[] = [];
      let textContent = "";
      for (const part of parts) {
        if (part.functionCall) {
          const sanitizedName = part.functionCall.name;
          toolCalls.push({
            name: nameMap.get(sanitizedName) ?? sanitizedName,
            arguments: part.functionCall.args ?? {},
          });
        } else if (part.text) {
          textContent += part.text;
        }
      }

      return {
        content: textContent || undefined,
        toolCalls,
        usage: lastUsage || undefined
      };
    },
    getUsage: () => lastUsage
  };
}
