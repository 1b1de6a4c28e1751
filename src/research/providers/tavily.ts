import { TavilySearch } from "@langchain/tavily";
import { z } from "zod";
import { SEARCH_MAX_RESULTS } from "../constants";
import { SearchProvider } from "../search-capability";
import { ProviderSearchRequest, SearchOutputType } from "../types";

const TavilyResultSchema = z.object({
  title: z.string().nullish(),
  url: z.string().nullish(),
  content: z.string().nullish(),
  score: z.number().nullish(),
});

const TavilyResponseSchema = z.object({
  query: z.string().nullish(),
  answer: z.string().nullish(),
  results: z.array(TavilyResultSchema).default([]),
});

type TavilyResponse = z.infer<typeof TavilyResponseSchema>;

function formatResults(response: TavilyResponse): string {
  if (response.results.length === 0) {
    return "No results found.";
  }
  return response.results
    .map((result, index) => {
      const lines = [`${index + 1}. ${result.title || "Untitled"}`];
      if (result.url) lines.push(`   URL: ${result.url}`);
      if (result.content) lines.push(`   ${result.content}`);
      return lines.join("\n");
    })
    .join("\n\n");
}

function formatSourcedAnswer(response: TavilyResponse): string {
  const sources = response.results
    .map((result, index) => `${index + 1}. ${result.title || "Untitled"}${result.url ? ` (${result.url})` : ""}`)
    .join("\n");
  const answer = response.answer ? `Answer: ${response.answer}` : "Answer: (none provided)";
  return sources ? `${answer}\n\nSources:\n${sources}` : answer;
}

/**
 * Renders a Tavily tool response as text for the search role.
 *
 * TavilySearch reports some failures as an `{ error }` object rather than
 * throwing; those are raised here so they count as provider errors.
 */
export function formatTavilyResponse(response: unknown, outputType: SearchOutputType): string {
  if (typeof response === "string") {
    return response;
  }
  if (typeof response === "object" && response !== null && "error" in response) {
    const reason = response.error instanceof Error ? response.error.message : String(response.error);
    throw new Error(`Tavily search failed: ${reason}`);
  }

  const parsed = TavilyResponseSchema.safeParse(response);
  if (!parsed.success) {
    throw new Error("Tavily search returned an unexpected response");
  }

  switch (outputType) {
    case "structured":
      return JSON.stringify(parsed.data, null, 2);
    case "sourcedAnswer":
      return formatSourcedAnswer(parsed.data);
    case "searchResults":
      return formatResults(parsed.data);
  }
}

interface TavilyProviderOptions {
  apiKey: string;
  maxResults?: number;
}

export class TavilySearchProvider implements SearchProvider {
  private readonly apiKey: string;
  private readonly maxResults: number;

  constructor(options: TavilyProviderOptions) {
    this.apiKey = options.apiKey;
    this.maxResults = options.maxResults ?? SEARCH_MAX_RESULTS;
  }

  async search({ query, depth, outputType }: ProviderSearchRequest, signal?: AbortSignal): Promise<string> {
    // Depth and answer mode are construction options on TavilySearch
    const searchTool = new TavilySearch({
      maxResults: this.maxResults,
      tavilyApiKey: this.apiKey,
      searchDepth: depth === "deep" ? "advanced" : "basic",
      includeAnswer: outputType === "sourcedAnswer",
    });

    const response: unknown = await searchTool.invoke({ query }, { signal });
    return formatTavilyResponse(response, outputType);
  }
}
