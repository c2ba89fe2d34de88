/**
 * Shared types for web search providers and agent tools.
 */

import type { ToolDefinition } from "../llms/types.js";

export interface WebSearchResult {
  title: string;
  url: string;
  snippet: string;
}

export interface WebSearchProvider {
  readonly name: string;
  search(query: string, count: number): Promise<WebSearchResult[]>;
}

export interface WebSearchProviderConfig {
  apiKey: string;
}

/** A tool the refinement agent can expose to the model and execute on its behalf. */
export interface AgentTool {
  definition: ToolDefinition;
  execute(args: Record<string, unknown>): Promise<unknown>;
}
