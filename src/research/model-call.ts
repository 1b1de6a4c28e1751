import { BaseMessage } from "@langchain/core/messages";
import { RunnableConfig } from "@langchain/core/runnables";
import { RoleModel } from "../shared/utils/models";
import { ResearchError, errorMessage, isRateLimitError } from "./errors";
import { RoleConfig } from "./types";

/**
 * Calls a role's model with the role's request timeout.
 *
 * This is the one place provider failures are inspected: overload, quota
 * and rate-limit responses leave here as RateLimited, everything else is
 * rethrown untouched.
 */
export async function invokeRole(
  model: RoleModel,
  messages: BaseMessage[],
  role: RoleConfig,
  config: Partial<RunnableConfig> = {}
): Promise<BaseMessage> {
  try {
    return await model.invoke(messages, {
      callbacks: config.callbacks,
      signal: config.signal,
      timeout: role.requestTimeoutMs,
    });
  } catch (error) {
    if (config.signal?.aborted) {
      throw error;
    }
    if (isRateLimitError(error)) {
      throw new ResearchError("RateLimited", `The ${role.name} model is rate limited: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    throw error;
  }
}

/**
 * Plain text of a model response, joining text parts of multi-part content.
 */
export function messageText(message: BaseMessage): string {
  const { content } = message;
  if (typeof content === "string") {
    return content;
  }
  return content
    .map((part) => ("text" in part && typeof part.text === "string" ? part.text : ""))
    .join("");
}
