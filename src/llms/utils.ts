import type { CompletionRequest, JSONSchema, LLMToolResult, ToolCall, ToolDefinition } from "./types.js";

export function sanitizeToolName(name: string): string {
  return name.replace(/[^a-zA-Z0-9_-]/g, "_");
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseToolArguments(argsJson: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(argsJson);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

export type OpenAICompatibleChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string };

export interface OpenAICompatibleToolCall {
  function?: {
    name: string;
    arguments: string;
  };
}

export interface OpenAICompatibleMessage {
  content?: string | null;
  tool_calls?: OpenAICompatibleToolCall[];
}

export type OpenAICompatibleTool = {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: JSONSchema;
  };
};

export type ToolNameMap = Map<string, { originalName: string; def: ToolDefinition }>;

export function toOpenAICompatibleMessages(request: CompletionRequest): OpenAICompatibleChatMessage[] {
  const messages: OpenAICompatibleChatMessage[] = [{ role: "system", content: request.systemPrompt }];
  for (const turn of request.history ?? []) {
    messages.push(turn.role === "assistant"
      ? { role: "assistant", content: turn.content }
      : { role: "user", content: turn.content });
  }
  messages.push({ role: "user", content: request.userContent });
  return messages;
}

export function createOpenAICompatibleTools(tools: ToolDefinition[]): { nameMap: ToolNameMap; formattedTools: OpenAICompatibleTool[] } {
  const nameMap: ToolNameMap = new Map();
  const formattedTools = tools.map((tool): OpenAICompatibleTool => {
    const sanitized = sanitizeToolName(tool.name);
    nameMap.set(sanitized, { originalName: tool.name, def: tool });
    return {
      type: "function",
      function: {
        name: sanitized,
        description: tool.description,
        parameters: tool.parameters,
      },
    };
  });

  return { nameMap, formattedTools };
}

export function parseOpenAICompatibleResponse(
  message: OpenAICompatibleMessage | null | undefined,
  nameMap: ToolNameMap
): LLMToolResult {
  const rawCalls = message?.tool_calls ?? [];
  const toolCalls: ToolCall[] = [];
  for (const call of rawCalls) {
    if (!call.function) continue;
    const sanitizedName = call.function.name;
    const mapped = nameMap.get(sanitizedName);
    toolCalls.push({
      name: mapped?.originalName ?? sanitizedName,
      arguments: parseToolArguments(call.function.arguments || "{}"),
    });
  }

  return {
    content: message?.content || undefined,
    toolCalls,
  };
}
