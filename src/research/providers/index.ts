import { ResearchError, errorMessage } from "../errors";
import { SearchProvider } from "../search-capability";

export type SearchProviderFactory = (apiKey: string) => Promise<SearchProvider>;

type TavilyModule = typeof import("./tavily");

/**
 * Builds a factory that loads the Tavily provider on demand. A failed
 * load is CapabilityUnavailable for the attempt.
 */
export function tavilyProviderLoader(
  load: () => Promise<TavilyModule> = () => import("./tavily")
): SearchProviderFactory {
  return async (apiKey) => {
    let tavily: TavilyModule;
    try {
      tavily = await load();
    } catch (error) {
      throw new ResearchError(
        "CapabilityUnavailable",
        `Tavily search provider could not be loaded: ${errorMessage(error)}`,
        { cause: error }
      );
    }
    return new tavily.TavilySearchProvider({ apiKey });
  };
}

export const loadTavilyProvider: SearchProviderFactory = tavilyProviderLoader();
