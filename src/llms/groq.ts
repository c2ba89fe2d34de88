import OpenAI from "openai";
import type { CompletionRequest, LLMHandle, LLMToolResult, TokenUsage, ToolDefinition } from "./types.js";
import {
  createOpenAICompatibleTools,
  parseOpenAICompatibleResponse,
  toOpenAICompatibleMessages,
  type OpenAICompatibleChatMessage,
  type OpenAICompatibleMessage,
  type OpenAICompatibleTool,
} from "./utils.js";
import { normalizeTokenUsage } from "../token-utils.js";
import { GROQ_BASE_URL } from "../constants.js";

export type GroqChatParams = {
  model: string;
  messages: OpenAICompatibleChatMessage[];
  temperature?: number;
  max_tokens?: number;
  tools?: OpenAICompatibleTool[];
  tool_choice?: "auto";
};

export type GroqChatResponse = {
  choices: Array<{ message?: OpenAICompatibleMessage | null }>;
  usage?: { prompt_tokens?: number; completion_tokens?: number; total_tokens?: number } | null;
};

type GroqChatClient = {
  chat: { completions: { create: (params: GroqChatParams) => Promise<GroqChatResponse> } };
};

export type GroqOptions = {
  temperature?: number;
  max_tokens?: number;
};

export type GroqConfig = {
  apiKey: string;
  model: string; // Required - e.g. "llama-3.1-8b-instant"
  baseURL?: string; // default https://api.groq.com/openai/v1
  client?: GroqChatClient;
  options?: GroqOptions;
};

export function llmGroq(cfg: GroqConfig): LLMHandle {
  if (!cfg.model) {
    throw new Error(
      "llmGroq: Missing required 'model' parameter. " +
      "Please specify which Groq model to use. " +
      "Example: llmGroq({ apiKey: 'gsk-...', model: 'llama-3.1-8b-instant' })"
    );
  }
  if (!cfg.apiKey && !cfg.client) {
    throw new Error(
      "llmGroq: Missing required 'apiKey' parameter. " +
      "Example: llmGroq({ apiKey: 'gsk-...', model: 'llama-3.1-8b-instant' })"
    );
  }
  const model = cfg.model;
  const options = cfg.options || {};
  let lastUsage: TokenUsage | null = null;
  let client = cfg.client;

  if (!client) {
    const sdk = new OpenAI({ apiKey: cfg.apiKey, baseURL: cfg.baseURL || GROQ_BASE_URL });
    client = {
      chat: {
        completions: {
          create: (params) => sdk.chat.completions.create(params),
        },
      },
    };
  }
  const chat = client.chat.completions;

  const baseParams = (request: CompletionRequest): GroqChatParams => ({
    model,
    messages: toOpenAICompatibleMessages(request),
    ...options,
    ...(request.temperature !== undefined && { temperature: request.temperature }),
  });

  return {
    id: `Groq-${model}`,
    model,
    async gen(request: CompletionRequest): Promise<string> {
      const resp = await chat.create(baseParams(request));
      lastUsage = normalizeTokenUsage(resp.usage);
      return resp.choices[0]?.message?.content ?? "";
    },
    async genWithTools(request: CompletionRequest, tools: ToolDefinition[]): Promise<LLMToolResult> {
      const { nameMap, formattedTools } = createOpenAICompatibleTools(tools);

      const resp = await chat.create({
        ...baseParams(request),
        ...(formattedTools.length > 0 && { tools: formattedTools, tool_choice: "auto" }),
      });
      lastUsage = normalizeTokenUsage(resp.usage);

      const result = parseOpenAICompatibleResponse(resp.choices[0]?.message, nameMap);
      result.usage = lastUsage || undefined;
      return result;
    },
    getUsage: () => lastUsage
  };
}
