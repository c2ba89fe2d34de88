/**
 * Tavily Search provider.
 *
 * Requires an API key passed in explicitly; nothing is read from the environment.
 *
 * Docs: https://docs.tavily.com/documentation/api-reference/endpoint/search
 */

import { z } from "zod";
import type { WebSearchProvider, WebSearchProviderConfig, WebSearchResult } from "./types.js";
import { SEARCH_TIMEOUT_MS, TAVILY_SEARCH_URL } from "../constants.js";

const TAVILY_MAX_RESULTS = 20;

const TavilyResponseSchema = z.object({
  results: z.array(z.object({
    title: z.string().optional(),
    url: z.string().optional(),
    content: z.string().optional(),
  })).optional(),
});

export class TavilySearchProvider implements WebSearchProvider {
  readonly name = "tavily";
  private readonly apiKey: string;

  constructor(cfg: WebSearchProviderConfig) {
    if (!cfg.apiKey.trim()) {
      throw new Error("Tavily search requires a non-empty API key");
    }
    this.apiKey = cfg.apiKey;
  }

  async search(query: string, count: number): Promise<WebSearchResult[]> {
    const maxResults = Math.max(1, Math.min(count, TAVILY_MAX_RESULTS));

    const response = await fetch(TAVILY_SEARCH_URL, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({ query, max_results: maxResults }),
      signal: AbortSignal.timeout(SEARCH_TIMEOUT_MS),
    });

    if (!response.ok) {
      const text = await response.text().catch(() => "");
      throw new Error(`Tavily Search API returned ${response.status}: ${text.slice(0, 200)}`);
    }

    const data = TavilyResponseSchema.parse(await response.json());

    return (data.results ?? []).map((item) => ({
      title: item.title ?? "",
      url: item.url ?? "",
      snippet: item.content ?? "",
    }));
  }
}
