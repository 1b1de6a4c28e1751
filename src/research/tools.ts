import { z } from "zod";
import { tool } from "@langchain/core/tools";
import { SearchCapability } from "./search-capability";
import { SearchOutcome } from "./types";

export const WEB_SEARCH_TOOL_NAME = "web_search";

/**
 * Tool schema the search role sees. There is no depth argument: the
 * capability picks depth from the call's position in the sequence.
 */
export const WebSearchSchema = z.object({
  query: z.string().min(1).describe("The search query to perform"),
  outputType: z
    .enum(["searchResults", "sourcedAnswer", "structured"])
    .default("searchResults")
    .describe("Output type: 'searchResults', 'sourcedAnswer', or 'structured'"),
});

/**
 * Validates raw tool-call arguments and runs the search.
 * Invalid arguments come back as text so the model can correct itself.
 */
export async function executeSearchCall(
  capability: SearchCapability,
  args: unknown,
  signal?: AbortSignal
): Promise<SearchOutcome> {
  const parsed = WebSearchSchema.safeParse(args);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`).join("; ");
    return { kind: "error", errorKind: "InvalidArguments", text: `Error: invalid search arguments (${details})` };
  }
  return capability.search(parsed.data, signal);
}

export const createWebSearchTool = (capability: SearchCapability) =>
  tool(
    async (args, config) => {
      const outcome = await executeSearchCall(capability, args, config?.signal);
      return outcome.text;
    },
    {
      name: WEB_SEARCH_TOOL_NAME,
      description: `Search the web and return comprehensive results (max ${capability.session.maxSearches} searches per session)`,
      schema: WebSearchSchema,
    }
  );
