/**
 * Web search through the Tavily search API. The key is supplied when the tool
 * is built; the tool never reads the environment.
 */

import { z } from "zod";
import { ToolDef } from "../types";

export const TAVILY_SEARCH_URL = "https://api.tavily.com/search";
export const MISSING_KEY_MESSAGE = "Error: Tool unavailable (API_KEY missing)";

export interface WebSearchToolConfig {
  apiKey?: string;
  endpoint?: string;
  fetchImpl?: typeof fetch;
}

const TavilyResponseSchema = z.object({
  results: z.array(
    z.object({
      url: z.string(),
      content: z.string(),
      title: z.string().optional(),
    })
  ),
});

export function createWebSearchTool(config: WebSearchToolConfig = {}): ToolDef {
  const endpoint = config.endpoint ?? TAVILY_SEARCH_URL;
  const fetchImpl = config.fetchImpl ?? fetch;

  return {
    name: "web_search",
    description: [
      "Performs a web search using the Tavily API.",
      "Tavily specializes in providing AI-optimized search results with high accuracy and relevance.",
      "",
      "Args:",
      "    query (str): The search query string to be processed by Tavily's search engine.",
      "",
      "Returns:",
      "    dict: the top search result, containing:",
      "        - url: The URL of the webpage",
      "        - content: A snippet or content preview",
    ].join("\n"),
    parameters: {
      type: "object",
      properties: {
        query: { type: "string", minLength: 1 },
      },
      required: ["query"],
    },
    run: async (args) => {
      if (!config.apiKey) return MISSING_KEY_MESSAGE;

      const response = await fetchImpl(endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${config.apiKey}`,
        },
        body: JSON.stringify({ query: String(args.query), max_results: 1 }),
      });

      if (!response.ok) {
        throw new Error(`Search API error: ${response.status} ${response.statusText}`);
      }

      const parsed = TavilyResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error("Search API returned an unexpected payload");
      }

      const top = parsed.data.results[0];
      if (!top) return "No results found";
      return { url: top.url, content: top.content };
    },
  };
}
