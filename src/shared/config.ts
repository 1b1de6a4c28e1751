import dotenv from "dotenv";
import { z } from "zod";
import { ResearchError } from "../research/errors";

dotenv.config();

export type ModelProvider = "vertexai" | "openai" | "anthropic";

export const DEFAULT_MODELS: Record<ModelProvider, string> = {
  vertexai: "gemini-2.5-pro",
  openai: "gpt-4o",
  anthropic: "claude-sonnet-4-20250514",
};

// Blank values in .env count as unset
const optionalValue = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().optional()
);

const EnvSchema = z.object({
  RESEARCH_MODEL_PROVIDER: z.preprocess(
    (value) => (typeof value === "string" && value.trim() !== "" ? value.trim().toLowerCase() : undefined),
    z.enum(["vertexai", "openai", "anthropic"]).default("vertexai")
  ),
  RESEARCH_MODEL: optionalValue,
  GOOGLE_APPLICATION_CREDENTIALS: optionalValue,
  OPENAI_API_KEY: optionalValue,
  ANTHROPIC_API_KEY: optionalValue,
  TAVILY_API_KEY: optionalValue,
  RESEARCH_OUTPUT_DIR: optionalValue,
  RESEARCH_EVENT_LOG: optionalValue,
});

export interface ResearchConfig {
  modelProvider: ModelProvider;
  model: string;
  credentials: {
    googleApplicationCredentials?: string;
    openaiApiKey?: string;
    anthropicApiKey?: string;
    tavilyApiKey?: string;
  };
  outputDir: string;
  eventLogPath?: string;
}

/**
 * Reads the research configuration from environment variables.
 *
 * Missing credentials are not an error here: each attempt checks the ones
 * it needs so the failure reaches the caller as a configuration message.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ResearchConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ResearchError("InvalidConfiguration", `Invalid research configuration (${details})`, {
      cause: parsed.error,
    });
  }

  const values = parsed.data;
  return {
    modelProvider: values.RESEARCH_MODEL_PROVIDER,
    model: values.RESEARCH_MODEL ?? DEFAULT_MODELS[values.RESEARCH_MODEL_PROVIDER],
    credentials: {
      googleApplicationCredentials: values.GOOGLE_APPLICATION_CREDENTIALS,
      openaiApiKey: values.OPENAI_API_KEY,
      anthropicApiKey: values.ANTHROPIC_API_KEY,
      tavilyApiKey: values.TAVILY_API_KEY,
    },
    outputDir: values.RESEARCH_OUTPUT_DIR ?? "reports",
    eventLogPath: values.RESEARCH_EVENT_LOG,
  };
}

/**
 * Returns the credential or raises a MissingCredential error naming the
 * environment variable.
 */
export function requireCredential(value: string | undefined, variable: string): string {
  if (!value) {
    throw new ResearchError("MissingCredential", `${variable} environment variable is not set`);
  }
  return value;
}
