import { HumanMessage, SystemMessage } from "@langchain/core/messages";
import { RunnableConfig } from "@langchain/core/runnables";
import { RoleModel } from "../shared/utils/models";
import { ResearchError } from "./errors";
import { invokeRole, messageText } from "./model-call";
import { formatSearchContext, WRITER_SYSTEM_PROMPT, writerTaskPrompt } from "./prompts";
import { RoleConfig, SearchResult } from "./types";

export interface SynthesisInput {
  query: string;
  findings: SearchResult[];
  searchNotes: string;
}

/**
 * Writes the report from the search stage's output. An empty response
 * uses up one iteration; the stage fails once none are left.
 */
export async function synthesizeReport(
  model: RoleModel,
  role: RoleConfig,
  input: SynthesisInput,
  config: Partial<RunnableConfig> = {}
): Promise<string> {
  const messages = [
    new SystemMessage(WRITER_SYSTEM_PROMPT),
    new HumanMessage(writerTaskPrompt(input.query, formatSearchContext(input.findings, input.searchNotes))),
  ];

  for (let iteration = 1; iteration <= role.maxIterations; iteration++) {
    const response = await invokeRole(model, messages, role, config);
    const report = messageText(response).trim();
    if (report) {
      return report;
    }
  }

  throw new ResearchError(
    "Generic",
    `Synthesis stage produced no report within ${role.maxIterations} iterations`
  );
}
