import { MAX_RESULT_CHARS, SEARCH_PACING_MS } from './constants';
import { errorMessage } from './errors';
import { SearchSession } from './search-session';
import { Sleep, sleep as defaultSleep } from '../shared/utils/sleep';
import { ProviderSearchRequest, SearchDepth, SearchOutcome, SearchRequest, SearchResult } from './types';

/**
 * External web search backend.
 */
export interface SearchProvider {
  search(request: ProviderSearchRequest, signal?: AbortSignal): Promise<string>;
}

export interface SearchCapabilityOptions {
  session: SearchSession;
  provider?: SearchProvider;             // Absent when the provider could not be loaded
  apiKey?: string;
  pacingMs?: number;
  maxResultChars?: number;
  sleep?: Sleep;
}

export function truncateResult(
  rawText: string,
  sequenceNumber: number,
  depth: SearchDepth,
  limit: number = MAX_RESULT_CHARS
): { text: string; truncated: boolean } {
  if (rawText.length <= limit) {
    return { text: rawText, truncated: false };
  }
  return {
    text: `${rawText.slice(0, limit)}\n... [Results truncated at ${limit} chars, search ${sequenceNumber} using ${depth} depth]`,
    truncated: true,
  };
}

/**
 * One budget-gated web search.
 *
 * Order of checks: provider present, budget left, credential present.
 * Depth comes from the sequence number the search will get, and a fixed
 * pacing delay runs before every provider call. Only completed searches
 * count against the budget.
 */
export class SearchCapability {
  readonly session: SearchSession;
  private readonly provider?: SearchProvider;
  private readonly apiKey?: string;
  private readonly pacingMs: number;
  private readonly maxResultChars: number;
  private readonly sleep: Sleep;

  constructor(options: SearchCapabilityOptions) {
    this.session = options.session;
    this.provider = options.provider;
    this.apiKey = options.apiKey;
    this.pacingMs = options.pacingMs ?? SEARCH_PACING_MS;
    this.maxResultChars = options.maxResultChars ?? MAX_RESULT_CHARS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async search(request: SearchRequest, signal?: AbortSignal): Promise<SearchOutcome> {
    if (!this.provider) {
      return {
        kind: 'error',
        errorKind: 'CapabilityUnavailable',
        text: 'Error: the web search provider is not available. Install it with: npm install @langchain/tavily',
      };
    }

    if (!this.session.checkAndReserve()) {
      return {
        kind: 'exhausted',
        text: `Maximum search limit (${this.session.maxSearches}) reached. Please analyze existing results.`,
      };
    }

    if (!this.apiKey) {
      return {
        kind: 'error',
        errorKind: 'MissingCredential',
        text: 'Error: TAVILY_API_KEY environment variable not set',
      };
    }

    const depth = this.session.nextDepth();
    await this.sleep(this.pacingMs, signal);

    let rawText: string;
    try {
      rawText = await this.provider.search({ ...request, depth }, signal);
    } catch (error) {
      // A stage or pipeline timeout is not a search failure
      if (signal?.aborted) {
        throw error;
      }
      return {
        kind: 'error',
        errorKind: 'ProviderError',
        text: `Error occurred while searching: ${errorMessage(error)}`,
      };
    }

    const sequenceNumber = this.session.recordCompletedSearch();
    const { text, truncated } = truncateResult(rawText, sequenceNumber, depth, this.maxResultChars);
    const result: SearchResult = {
      query: request.query,
      rawText: text,
      truncated,
      sequenceNumber,
      depthUsed: depth,
    };

    return {
      kind: 'result',
      result,
      text: `Search ${sequenceNumber}/${this.session.maxSearches} (${depth} depth):\n${text}`,
    };
  }
}
