import { END, GraphRecursionError, LangGraphRunnableConfig, START, StateGraph } from "@langchain/langgraph";
import { HumanMessage, isAIMessage, SystemMessage } from "@langchain/core/messages";
import { RunnableConfig } from "@langchain/core/runnables";
import { loadConfig, requireCredential, ResearchConfig } from "../shared/config";
import { createRoleModel, RoleModel, RoleModels } from "../shared/utils/models";
import { Sleep } from "../shared/utils/sleep";
import { PIPELINE_TIMEOUT_MS, SEARCHER_ROLE, WRITER_ROLE } from "./constants";
import { ResearchError } from "./errors";
import { messageText } from "./model-call";
import { reportProgress } from "./progress";
import { searchTaskPrompt, SEARCHER_SYSTEM_PROMPT } from "./prompts";
import { loadTavilyProvider, SearchProviderFactory } from "./providers";
import { SearchCapability } from "./search-capability";
import { SearchSession } from "./search-session";
import { createSearchStage, searchRecursionLimit } from "./search-stage";
import { ResearchState, SearchStageState } from "./states";
import { synthesizeReport } from "./synthesis-stage";
import { createWebSearchTool } from "./tools";
import { RoleConfig } from "./types";

export interface PipelineDeps {
  searcher: RoleModel;
  writer: RoleModel;
  capability: SearchCapability;
  searcherRole?: RoleConfig;
  writerRole?: RoleConfig;
}

const seconds = (ms: number) => `${ms / 1000}s`;

/**
 * A stage's abort signal: its own time budget, combined with the
 * pipeline's signal when there is one.
 */
function stageBudget(parent: AbortSignal | undefined, timeoutMs: number) {
  const timeout = AbortSignal.timeout(timeoutMs);
  return { timeout, signal: parent ? AbortSignal.any([parent, timeout]) : timeout };
}

/**
 * Names the budget a stage ran out of. Other errors pass through as they are.
 */
function stageFailure(stage: string, role: RoleConfig, timeout: AbortSignal, error: unknown): unknown {
  if (error instanceof GraphRecursionError) {
    return new ResearchError("Generic", `${stage} stage exceeded its limit of ${role.maxIterations} iterations`, {
      cause: error,
    });
  }
  if (timeout.aborted && !(error instanceof ResearchError)) {
    return new ResearchError("Generic", `${stage} stage exceeded its time budget of ${seconds(role.stageTimeoutMs)}`, {
      cause: error,
    });
  }
  return error;
}

/**
 * Research Pipeline Graph
 *
 * ```
 * START -> search (SUBGRAPH) -> synthesize -> END
 * ```
 *
 * Strictly sequential: the writer only starts once the search stage has
 * finished, and its only input is what that stage gathered.
 */
export function createResearchPipeline(deps: PipelineDeps) {
  const searcherRole = deps.searcherRole ?? SEARCHER_ROLE;
  const writerRole = deps.writerRole ?? WRITER_ROLE;

  async function searchNode(state: typeof ResearchState.State, config: LangGraphRunnableConfig) {
    await reportProgress({ type: "stage_started", stage: "search", query: state.query }, config);

    const stage = createSearchStage({ model: deps.searcher, capability: deps.capability, role: searcherRole });
    const budget = stageBudget(config.signal, searcherRole.stageTimeoutMs);

    let result: typeof SearchStageState.State;
    try {
      result = await stage.invoke(
        {
          messages: [
            new SystemMessage(SEARCHER_SYSTEM_PROMPT),
            new HumanMessage(
              searchTaskPrompt(state.query, deps.capability.session.maxSearches, searcherRole.maxIterations)
            ),
          ],
        },
        {
          callbacks: config.callbacks,
          signal: budget.signal,
          recursionLimit: searchRecursionLimit(searcherRole),
        }
      );
    } catch (error) {
      throw stageFailure("Search", searcherRole, budget.timeout, error);
    }

    // The searcher's closing turn, when it ended without asking for more searches
    const lastMessage = result.messages[result.messages.length - 1];
    const searchNotes = lastMessage && isAIMessage(lastMessage) && !(lastMessage.tool_calls?.length)
      ? messageText(lastMessage)
      : "";

    await reportProgress({
      type: "stage_completed",
      stage: "search",
      detail: `${result.findings.length} searches`,
    }, config);

    return { findings: result.findings, searchNotes };
  }

  async function synthesizeNode(state: typeof ResearchState.State, config: LangGraphRunnableConfig) {
    await reportProgress({ type: "stage_started", stage: "synthesis", query: state.query }, config);

    const budget = stageBudget(config.signal, writerRole.stageTimeoutMs);
    let report: string;
    try {
      report = await synthesizeReport(
        deps.writer,
        writerRole,
        { query: state.query, findings: state.findings, searchNotes: state.searchNotes },
        { callbacks: config.callbacks, signal: budget.signal }
      );
    } catch (error) {
      throw stageFailure("Synthesis", writerRole, budget.timeout, error);
    }

    await reportProgress({ type: "stage_completed", stage: "synthesis", detail: `${report.length} characters` }, config);
    return { report };
  }

  const workflow = new StateGraph(ResearchState)
    .addNode("search", searchNode)
    .addNode("synthesize", synthesizeNode)
    .addEdge(START, "search")
    .addEdge("search", "synthesize")
    .addEdge("synthesize", END);

  return workflow.compile();
}

export interface AttemptContext {
  query: string;
  session: SearchSession;
  attemptIndex: number;
}

/**
 * Runs one pipeline attempt and resolves to the report body.
 */
export type AttemptRunner = (context: AttemptContext) => Promise<string>;

export interface PipelineRunnerOptions {
  config?: ResearchConfig;               // Read from the environment per attempt when absent
  models?: Partial<RoleModels>;         // Built from the configuration when absent
  createSearchProvider?: SearchProviderFactory;
  searcherRole?: RoleConfig;
  writerRole?: RoleConfig;
  pipelineTimeoutMs?: number;
  pacingMs?: number;
  sleep?: Sleep;
  callbacks?: RunnableConfig["callbacks"];
}

/**
 * Builds the attempt runner the retry controller drives.
 *
 * Every attempt repeats the pre-flight checks (configuration, model
 * credential, search credential, search provider) and builds fresh
 * collaborators around the attempt's search session.
 */
export function createPipelineRunner(options: PipelineRunnerOptions = {}): AttemptRunner {
  const searcherRole = options.searcherRole ?? SEARCHER_ROLE;
  const writerRole = options.writerRole ?? WRITER_ROLE;
  const pipelineTimeoutMs = options.pipelineTimeoutMs ?? PIPELINE_TIMEOUT_MS;

  return async ({ query, session }) => {
    const config = options.config ?? loadConfig();
    const writer = options.models?.writer ?? createRoleModel(config, writerRole);

    const apiKey = requireCredential(config.credentials.tavilyApiKey, "TAVILY_API_KEY");
    const provider = await (options.createSearchProvider ?? loadTavilyProvider)(apiKey);
    const capability = new SearchCapability({
      session,
      provider,
      apiKey,
      pacingMs: options.pacingMs,
      sleep: options.sleep,
    });
    const searcher = options.models?.searcher ?? createRoleModel(config, searcherRole, [createWebSearchTool(capability)]);

    const pipeline = createResearchPipeline({ searcher, writer, capability, searcherRole, writerRole });
    const pipelineTimeout = AbortSignal.timeout(pipelineTimeoutMs);

    try {
      const result = await pipeline.invoke({ query }, { callbacks: options.callbacks, signal: pipelineTimeout });
      return result.report;
    } catch (error) {
      if (pipelineTimeout.aborted && !(error instanceof ResearchError)) {
        throw new ResearchError("Generic", `Research pipeline exceeded its time budget of ${seconds(pipelineTimeoutMs)}`, {
          cause: error,
        });
      }
      throw error;
    }
  };
}
