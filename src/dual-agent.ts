// Public entry point

export { validateCredentials, HEALTH_CHECK_REQUEST, defaultReactiveProvider } from './validator.js';
export type { ValidateOptions } from './validator.js';
export { draft, REACTIVE_SYSTEM_PROMPT } from './agents/reactive.js';
export type { DraftOptions } from './agents/reactive.js';
export { refine, resolveTools, buildRefinementContent, defaultProactiveProvider, PROACTIVE_SYSTEM_PROMPT } from './agents/proactive.js';
export type { ExecutorFactory, RefineOptions } from './agents/proactive.js';
export { createToolCallingExecutor, validateToolArgs } from './agents/executor.js';
export type {
  AgentExecutor,
  IntermediateStep,
  RefinementInput,
  ToolCallingExecutor,
  ToolCallingExecutorConfig,
  ToolCallingExecutorResult,
} from './agents/executor.js';
export { classifyAgentOutput, extractAgentText, normalizeAgentOutput, FINAL_OUTPUT_KEYS } from './agents/output.js';
export type { AgentOutput } from './agents/output.js';
export { runDualAgents, runDualAgentsText, renderOutcome, toDualAgentError } from './runner.js';
export type { AgentLabel, DualAgentOutcome, RunOptions } from './runner.js';
export { createWorkerPool } from './patterns.js';
export type { WorkerPool } from './patterns.js';

export { llmGroq } from './llms/groq.js';
export type { GroqConfig, GroqOptions } from './llms/groq.js';
export { llmGemini } from './llms/gemini.js';
export type { GeminiConfig, GeminiOptions } from './llms/gemini.js';
export type {
  ChatMessage,
  CompletionRequest,
  JSONSchema,
  LLMHandle,
  LLMToolResult,
  TokenUsage,
  ToolCall,
  ToolDefinition,
} from './llms/types.js';

export { createSearchTool, defaultSearchProvider } from './tools/search-tool.js';
export type { SearchProviderFactory, SearchToolConfig } from './tools/search-tool.js';
export { TavilySearchProvider } from './tools/tavily.js';
export type { AgentTool, WebSearchProvider, WebSearchProviderConfig, WebSearchResult } from './tools/types.js';

export {
  DualAgentError,
  CredentialError,
  ProviderCallError,
  ToolInitError,
  ToolExecutionError,
  normalizeProviderError,
  redactSecrets,
  isRetryableStatus,
} from './errors.js';
export type { AgentRole, DualAgentErrorMeta } from './errors.js';
export { ok, fail } from './types.js';
export type { ObservabilityOptions, ProviderConfig, ProviderFactory, Result, SearchConfig } from './types.js';
export { createLogger, silentLogger, isDebugEnabled } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
export { createDualAgentTelemetry, noopTelemetry, traceLLMCall } from './telemetry.js';
export type { DualAgentTelemetry, DualAgentTelemetryConfig, MetricName } from './telemetry.js';
export { normalizeTokenUsage } from './token-utils.js';
export { createApp } from './server.js';
export type { AppOptions } from './server.js';
export { loadServerConfig, sanitizeKey, resolveRunRequest, RunRequestSchema } from './config.js';
export type { ResolvedRun, RunRequest, ServerConfig } from './config.js';
export * from './constants.js';
