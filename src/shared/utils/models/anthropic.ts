import {ChatAnthropic} from "@langchain/anthropic";
import {ResearchError} from "../../../research/errors";

interface AnthropicArgs  {
  streaming: boolean;
  apiKey?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  maxRetries?: number;
}

export const claudeBase = (args: AnthropicArgs): ChatAnthropic => {
  if(!args.apiKey) {
    throw new ResearchError(
      "MissingCredential",
      "ANTHROPIC_API_KEY environment variable is not set."
    );
  }

  return new ChatAnthropic({
    apiKey: args.apiKey,
    model: args.model ?? "claude-sonnet-4-20250514",
    temperature: args.temperature ?? 0.4,
    maxTokens: args.maxTokens,
    streaming: args.streaming,
    maxRetries: args.maxRetries ?? 2,
  })
}
