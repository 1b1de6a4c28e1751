import { BaseMessage } from "@langchain/core/messages";
import { RunnableConfig } from "@langchain/core/runnables";
import { StructuredToolInterface } from "@langchain/core/tools";
import { ResearchConfig } from "../../config";
import { RoleConfig } from "../../../research/types";
import { claudeBase } from "./anthropic";
import { gptBase } from "./openai";
import { geminiBase } from "./vertexai";

/**
 * The slice of a chat model the pipeline calls. Chat models and their
 * tool-bound runnables satisfy it; tests supply plain objects.
 */
export interface RoleModel {
  invoke(messages: BaseMessage[], options?: Partial<RunnableConfig>): Promise<BaseMessage>;
}

export interface RoleModels {
  searcher: RoleModel;
  writer: RoleModel;
}

const modelArgs = (config: ResearchConfig, role: RoleConfig) => ({
  streaming: false,
  model: config.model,
  temperature: role.temperature,
  maxRetries: role.maxRetries,
});

/**
 * Builds the model for a role on the configured provider, binding tools
 * when the role gets any.
 */
export function createRoleModel(
  config: ResearchConfig,
  role: RoleConfig,
  tools: StructuredToolInterface[] = []
): RoleModel {
  switch (config.modelProvider) {
    case "vertexai": {
      const gemini = geminiBase({
        ...modelArgs(config, role),
        keyFilename: config.credentials.googleApplicationCredentials,
        maxOutputTokens: role.maxTokens,
      });
      return tools.length > 0 ? gemini.bindTools(tools) : gemini;
    }
    case "openai": {
      const gpt = gptBase({
        ...modelArgs(config, role),
        apiKey: config.credentials.openaiApiKey,
        maxTokens: role.maxTokens,
      });
      return tools.length > 0 ? gpt.bindTools(tools) : gpt;
    }
    case "anthropic": {
      const claude = claudeBase({
        ...modelArgs(config, role),
        apiKey: config.credentials.anthropicApiKey,
        maxTokens: role.maxTokens,
      });
      return tools.length > 0 ? claude.bindTools(tools) : claude;
    }
  }
}
