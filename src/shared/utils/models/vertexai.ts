import {ChatVertexAI} from "@langchain/google-vertexai";
import {ResearchError} from "../../../research/errors";

interface GeminiArgs  {
  streaming: boolean;
  model?: string;
  keyFilename?: string;
  temperature?: number;
  maxOutputTokens?: number;
  maxRetries?: number;
}

export const geminiBase = (args: GeminiArgs): ChatVertexAI => {
  if(!args.keyFilename) {
    throw new ResearchError(
      "MissingCredential",
      "GOOGLE_APPLICATION_CREDENTIALS environment variable is not set. " +
      "Gemini cannot be initialized. Ensure it's set to the path of your service account key file."
    );
  }

  return new ChatVertexAI({
    model: args.model ?? "gemini-2.5-pro",
    temperature: args.temperature ?? 0.4,
    maxOutputTokens: args.maxOutputTokens,
    streaming: args.streaming,
    maxRetries: args.maxRetries ?? 2,
    authOptions: {
      keyFilename: args.keyFilename,
    },
  })
}
