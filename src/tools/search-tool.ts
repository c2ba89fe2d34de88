import type { AgentTool, WebSearchProvider, WebSearchProviderConfig } from "./types.js";
import { TavilySearchProvider } from "./tavily.js";
import { ToolExecutionError, ToolInitError, errorMessage } from "../errors.js";
import { DEFAULT_SEARCH_MAX_RESULTS, WEB_SEARCH_TOOL_NAME } from "../constants.js";

export type SearchProviderFactory = (cfg: WebSearchProviderConfig) => WebSearchProvider;

export type SearchToolConfig = {
  apiKey: string;
  maxResults?: number;
  provider?: SearchProviderFactory;
};

export const defaultSearchProvider: SearchProviderFactory = (cfg) => new TavilySearchProvider(cfg);

/**
 * Build the `web_search` tool bound to one API key. The key is captured by the
 * provider instance only.
 *
 * @throws ToolInitError when the key is blank or the provider cannot be created
 */
export function createSearchTool(cfg: SearchToolConfig): AgentTool {
  if (!cfg.apiKey.trim()) {
    throw new ToolInitError("Search tool requires an API key");
  }
  const maxResults = cfg.maxResults ?? DEFAULT_SEARCH_MAX_RESULTS;
  const factory = cfg.provider ?? defaultSearchProvider;

  let provider: WebSearchProvider;
  try {
    provider = factory({ apiKey: cfg.apiKey });
  } catch (e) {
    throw new ToolInitError(`Search tool failed to initialize: ${errorMessage(e)}`, {}, { cause: e });
  }

  return {
    definition: {
      name: WEB_SEARCH_TOOL_NAME,
      description:
        "Search the web for supporting facts, statistics or recent trends. " +
        `Returns up to ${maxResults} ranked results with title, url and snippet.`,
      parameters: {
        type: "object",
        properties: {
          query: { type: "string", minLength: 1, description: "The search query" },
        },
        required: ["query"],
        additionalProperties: false,
      },
    },
    async execute(args) {
      const query = typeof args.query === "string" ? args.query : "";
      try {
        return await provider.search(query, maxResults);
      } catch (e) {
        throw new ToolExecutionError(`${provider.name} search failed: ${errorMessage(e)}`, {}, { cause: e });
      }
    },
  };
}
