export type JSONSchema = {
  type: "object";
  properties: Record<string, unknown>;
  required?: string[];
  additionalProperties?: boolean;
  [key: string]: unknown;
};

export type ToolDefinition = {
  name: string;
  description: string;
  parameters: JSONSchema;
};

export type ChatMessage = {
  role: "user" | "assistant";
  content: string;
};

export type CompletionRequest = {
  systemPrompt: string;
  userContent: string;
  history?: ChatMessage[];
  temperature?: number;
};

export type TokenUsage = {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
};

export type ToolCall = {
  name: string;
  arguments: Record<string, unknown>;
};

export type LLMToolResult = {
  content?: string;
  toolCalls: ToolCall[];
  usage?: TokenUsage;
};

export type LLMHandle = {
  id: string;
  model: string;
  gen: (request: CompletionRequest) => Promise<string>;
  genWithTools: (request: CompletionRequest, tools: ToolDefinition[]) => Promise<LLMToolResult>;
  // Usage reported by the last call, when the provider returns it
  getUsage?: () => TokenUsage | null;
};
