import type { ObservabilityOptions, ProviderConfig, ProviderFactory, SearchConfig } from '../types.js';
import type { AgentTool } from '../tools/types.js';
import type { AgentExecutor, RefinementInput } from './executor.js';
import { createToolCallingExecutor } from './executor.js';
import { extractAgentText } from './output.js';
import { llmGemini } from '../llms/gemini.js';
import { createSearchTool, type SearchProviderFactory } from '../tools/search-tool.js';
import { errorMessage, normalizeProviderError } from '../errors.js';
import { defaultLogger, type Logger } from '../logger.js';
import { noopTelemetry } from '../telemetry.js';
import { getLLMProviderId } from '../token-utils.js';

export const PROACTIVE_SYSTEM_PROMPT =
  "You are a sophisticated, proactive content strategist. Your task is to analyze " +
  "the 'DRAFT' content provided by another agent and refine it. " +
  "Your refinement must include:\n" +
  "1. **Analysis:** A brief critique of the draft (e.g., 'Good start, but needs data.').\n" +
  "2. **Refinement:** The final, polished content. Use the web_search tool to find supporting facts, statistics, or recent trends to enhance the content's credibility, if necessary.\n" +
  "3. **Next Steps:** Proactively suggest 2-3 logical next steps for the user (e.g., 'Next, create a diagram for this post,' or 'Run a second agent to translate this content.').\n\n" +
  "Your final response MUST be structured clearly with these three sections.";

export function buildRefinementContent(input: RefinementInput): string {
  return `DRAFT to refine: ${input.draft}\n\nOriginal Topic: ${input.topic}`;
}

export const defaultProactiveProvider: ProviderFactory = (cfg) =>
  llmGemini({ apiKey: cfg.apiKey, model: cfg.model, options: { temperature: cfg.temperature } });

export type ExecutorFactory = (cfg: {
  llmConfig: ProviderConfig;
  tools: AgentTool[];
}) => AgentExecutor;

export type RefineOptions = ObservabilityOptions & {
  provider?: ProviderFactory;
  searchProvider?: SearchProviderFactory;
  // Replaces the default tool-calling loop; its result may take any shape
  executor?: ExecutorFactory;
  maxIterations?: number;
};

/**
 * Build the tool set for one refinement. A search tool is created only when
 * search is enabled and a key is present; if it fails to initialize the agent
 * runs without tools.
 */
export function resolveTools(search: SearchConfig, searchProvider: SearchProviderFactory | undefined, logger: Logger): AgentTool[] {
  const apiKey = search.apiKey?.trim();
  if (!search.enabled || !apiKey) {
    if (search.enabled) logger.debug('Web search enabled without an API key; running without tools');
    return [];
  }
  try {
    return [createSearchTool({ apiKey, maxResults: search.maxResults, provider: searchProvider })];
  } catch (e) {
    logger.warn(`Web search unavailable, continuing without tools: ${errorMessage(e)}`);
    return [];
  }
}

/**
 * Critique and refine a draft, optionally backed by web search. The answer is
 * expected to carry Analysis, Refinement and Next Steps sections but is
 * returned as one block of text.
 *
 * @throws ProviderCallError when the model call fails
 */
export async function refine(
  draftText: string,
  topic: string,
  config: ProviderConfig,
  search: SearchConfig,
  opts: RefineOptions = {}
): Promise<string> {
  const logger = opts.logger ?? defaultLogger;
  const telemetry = opts.telemetry ?? noopTelemetry;
  const factory = opts.provider ?? defaultProactiveProvider;

  const tools = resolveTools(search, opts.searchProvider, logger);

  let provider: string | undefined;
  let raw: unknown;
  try {
    let executor: AgentExecutor;
    if (opts.executor) {
      executor = opts.executor({ llmConfig: config, tools });
    } else {
      const llm = factory(config);
      provider = getLLMProviderId(llm);
      executor = createToolCallingExecutor({
        llm,
        tools,
        systemPrompt: PROACTIVE_SYSTEM_PROMPT,
        buildUserContent: buildRefinementContent,
        temperature: config.temperature,
        maxIterations: opts.maxIterations,
        agent: 'proactive',
        logger,
        telemetry,
        parentSpan: opts.parentSpan,
      });
    }
    logger.debug(`Proactive refinement with ${tools.length} tool(s)${provider ? ` via ${provider}` : ''}`);
    raw = await executor.invoke({ draft: draftText, topic });
  } catch (e) {
    throw normalizeProviderError(e, { agent: 'proactive', provider });
  }

  return extractAgentText(raw);
}
