import {ChatOpenAI} from "@langchain/openai";
import {ResearchError} from "../../../research/errors";

interface OpenAIArgs  {
  streaming: boolean;
  apiKey?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  maxRetries?: number;
}

export const gptBase = (args: OpenAIArgs): ChatOpenAI => {
  if(!args.apiKey) {
    throw new ResearchError(
      "MissingCredential",
      "OPENAI_API_KEY environment variable is not set."
    );
  }

  return new ChatOpenAI({
    apiKey: args.apiKey,
    model: args.model ?? "gpt-4o",
    temperature: args.temperature ?? 0.4,
    maxTokens: args.maxTokens,
    streaming: args.streaming,
    maxRetries: args.maxRetries ?? 2,
  })
}
