import { END, LangGraphRunnableConfig, START, StateGraph } from "@langchain/langgraph";
import { isAIMessage, ToolMessage } from "@langchain/core/messages";
import { RoleModel } from "../shared/utils/models";
import { invokeRole } from "./model-call";
import { reportProgress } from "./progress";
import { SearchCapability } from "./search-capability";
import { SearchStageState } from "./states";
import { executeSearchCall, WEB_SEARCH_TOOL_NAME } from "./tools";
import { RoleConfig, SearchResult } from "./types";

export interface SearchStageDeps {
  model: RoleModel;                      // Searcher with the web_search tool bound
  capability: SearchCapability;
  role: RoleConfig;
}

/**
 * Graph steps the searcher may use: one model turn plus one tool round
 * per iteration, and a closing model turn.
 */
export const searchRecursionLimit = (role: RoleConfig): number => role.maxIterations * 2 + 1;

/**
 * Search Stage Graph
 *
 * ```
 * START -> searcher -> web_search -> searcher -> ... -> END
 * ```
 *
 * Unlike the prebuilt ToolNode, web_search runs the tool calls of a turn
 * one after another, so sequence numbers (and with them the depth of
 * every call) follow the order the model asked for them. The stage ends
 * when the model stops calling tools or the search budget is spent.
 */
export function createSearchStage(deps: SearchStageDeps) {
  const { model, capability, role } = deps;

  async function callSearcher(state: typeof SearchStageState.State, config: LangGraphRunnableConfig) {
    const response = await invokeRole(model, state.messages, role, config);
    return { messages: [response] };
  }

  async function runSearches(state: typeof SearchStageState.State, config: LangGraphRunnableConfig) {
    const lastMessage = state.messages[state.messages.length - 1];
    const toolCalls = lastMessage && isAIMessage(lastMessage) ? lastMessage.tool_calls ?? [] : [];

    const messages: ToolMessage[] = [];
    const findings: SearchResult[] = [];

    for (const toolCall of toolCalls) {
      const toolCallId = toolCall.id ?? "invalid_tool_call_id";

      if (toolCall.name !== WEB_SEARCH_TOOL_NAME) {
        messages.push(new ToolMessage({
          content: `Error: unknown tool "${toolCall.name}". Only ${WEB_SEARCH_TOOL_NAME} is available.`,
          tool_call_id: toolCallId,
          name: toolCall.name,
        }));
        continue;
      }

      const outcome = await executeSearchCall(capability, toolCall.args, config.signal);
      messages.push(new ToolMessage({ content: outcome.text, tool_call_id: toolCallId, name: toolCall.name }));

      if (outcome.kind === "result") {
        findings.push(outcome.result);
        await reportProgress({
          type: "search_completed",
          sequenceNumber: outcome.result.sequenceNumber,
          maxSearches: capability.session.maxSearches,
          depth: outcome.result.depthUsed,
          query: outcome.result.query,
          truncated: outcome.result.truncated,
        }, config);
      } else if (outcome.kind === "error") {
        const query = typeof toolCall.args.query === "string" ? toolCall.args.query : "";
        await reportProgress({ type: "search_failed", query, reason: outcome.text }, config);
      }
    }

    const budgetExhausted = capability.session.exhausted;
    if (budgetExhausted) {
      await reportProgress({ type: "search_budget_exhausted", maxSearches: capability.session.maxSearches }, config);
    }

    return { messages, findings, budgetExhausted };
  }

  function routeAfterSearcher(state: typeof SearchStageState.State) {
    const lastMessage = state.messages[state.messages.length - 1];
    if (lastMessage && isAIMessage(lastMessage) && (lastMessage.tool_calls?.length ?? 0) > 0) {
      return "web_search";
    }
    return "end";
  }

  function routeAfterSearches(state: typeof SearchStageState.State) {
    return state.budgetExhausted ? "end" : "searcher";
  }

  const workflow = new StateGraph(SearchStageState)
    .addNode("searcher", callSearcher)
    .addNode("web_search", runSearches)
    .addEdge(START, "searcher")
    .addConditionalEdges("searcher", routeAfterSearcher, {
      web_search: "web_search",
      end: END,
    })
    .addConditionalEdges("web_search", routeAfterSearches, {
      searcher: "searcher",
      end: END,
    });

  return workflow.compile();
}
