import { sleep as defaultSleep, Sleep } from "../shared/utils/sleep";
import { MAX_RETRIES, RETRY_DELAY_MS } from "./constants";
import { CONFIGURATION_KINDS, errorMessage, ResearchError, toResearchError } from "./errors";
import { AttemptRunner, createPipelineRunner, PipelineRunnerOptions } from "./pipeline";
import { buildReport } from "./report";
import { SearchSession } from "./search-session";
import { AttemptOutcome, ErrorKind, PipelineAttempt, ResearchOutcome } from "./types";

export type ResearchLogger = Pick<Console, "log" | "warn">;

export interface ResearchOptions {
  maxRetries?: number;
  retryDelayMs?: number;
  sleep?: Sleep;
  runAttempt?: AttemptRunner;            // Defaults to the two-stage pipeline
  pipeline?: PipelineRunnerOptions;      // Used only when runAttempt is absent
  logger?: ResearchLogger;
  failFastOnConfigurationError?: boolean;
  session?: SearchSession;
}

export const EMPTY_QUERY_MESSAGE = "Please enter a research question to get started.";

export const RETRIES_EXCEEDED_MESSAGE =
  "Maximum retries exceeded. Please try again later or contact support if the issue persists.";

export const RATE_LIMITED_MESSAGE = `API Rate Limited: The language model provider is currently overloaded. Please try again in a few minutes. For comprehensive research, consider:

1. Breaking your query into smaller, more specific questions
2. Trying again during off-peak hours
3. Using more specific search terms`;

export function limitedContentMessage(body: string): string {
  return `Research completed but content seems limited. Here's what was found:\n\n${body}\n\n`
    + "[Note: For more comprehensive results, try refining your query or checking API limits]";
}

/**
 * The text a caller sees after the last attempt failed.
 */
export function failureMessage(error: ResearchError): string {
  switch (error.kind) {
    case "RateLimited":
      return RATE_LIMITED_MESSAGE;
    case "CapabilityUnavailable":
      return `Search Provider Unavailable: ${error.message}\nPlease install the search provider: npm install @langchain/tavily`;
    case "MissingCredential":
    case "InvalidConfiguration":
      return `Configuration Error: ${error.message}\n\nSet the missing value in your environment or .env file, then try again.`;
    default:
      return `Error: ${error.message}

Troubleshooting tips:
1. Try simplifying your query
2. Check your API key configurations
3. Ensure stable internet connection
4. Try breaking complex queries into smaller parts`;
  }
}

/**
 * Wait before attempt `attemptIndex` (0-based). The first attempt starts
 * at once; a rate-limited failure pushes the next attempt one step further.
 */
export function backoffDelay(attemptIndex: number, retryDelayMs: number, previousKind?: ErrorKind): number {
  if (attemptIndex === 0) {
    return 0;
  }
  return previousKind === "RateLimited"
    ? retryDelayMs * (attemptIndex + 1)
    : retryDelayMs * attemptIndex;
}

/**
 * Runs the pipeline until it produces a report or the attempts run out.
 *
 * Every attempt starts from an empty search budget. A report under the
 * substantiality bar ends the loop with a limited-content notice; a
 * failure is retried, unless it is a configuration failure and
 * `failFastOnConfigurationError` is set.
 */
export async function executeResearch(query: string, options: ResearchOptions = {}): Promise<ResearchOutcome> {
  if (!query.trim()) {
    return { status: "rejected", text: EMPTY_QUERY_MESSAGE, attempts: [] };
  }

  const maxRetries = options.maxRetries ?? MAX_RETRIES;
  const retryDelayMs = options.retryDelayMs ?? RETRY_DELAY_MS;
  const wait = options.sleep ?? defaultSleep;
  const logger = options.logger ?? console;
  const runAttempt = options.runAttempt ?? createPipelineRunner(options.pipeline);
  const session = options.session ?? new SearchSession();

  const attempts: PipelineAttempt[] = [];
  let lastFailure: ResearchError | undefined;

  for (let attemptIndex = 0; attemptIndex < maxRetries; attemptIndex++) {
    const delayMs = backoffDelay(attemptIndex, retryDelayMs, lastFailure?.kind);
    if (delayMs > 0) {
      logger.log(`⏳ Waiting ${delayMs / 1000}s before attempt ${attemptIndex + 1}/${maxRetries}...`);
      await wait(delayMs);
    }
    session.reset();

    let body: string;
    try {
      body = await runAttempt({ query, session, attemptIndex });
    } catch (error) {
      lastFailure = toResearchError(error);
      const fatal = options.failFastOnConfigurationError === true && CONFIGURATION_KINDS.has(lastFailure.kind);
      const outcome: AttemptOutcome = {
        status: fatal ? "fatalFailure" : "retryableFailure",
        errorKind: lastFailure.kind,
        message: lastFailure.message,
      };
      attempts.push({ attemptIndex, delayMs, searchesUsed: session.searchCount, outcome });
      logger.warn(`❌ Attempt ${attemptIndex + 1}/${maxRetries} failed (${lastFailure.kind}): ${lastFailure.message}`);

      if (fatal) {
        break;
      }
      continue;
    }

    const report = buildReport(query, body);
    attempts.push({ attemptIndex, delayMs, searchesUsed: session.searchCount, outcome: { status: "success", report } });

    if (!report.substantial) {
      return { status: "limited", text: limitedContentMessage(body), report, errorKind: "ContentTooShort", attempts };
    }
    return { status: "succeeded", text: body, report, attempts };
  }

  if (!lastFailure) {
    return { status: "failed", text: RETRIES_EXCEEDED_MESSAGE, attempts };
  }
  return { status: "failed", text: failureMessage(lastFailure), errorKind: lastFailure.kind, attempts };
}

/**
 * Researches `query` and always resolves to text: the report, a
 * limited-content notice, or a message describing what went wrong.
 */
export async function runResearch(query: string, options: ResearchOptions = {}): Promise<string> {
  try {
    const outcome = await executeResearch(query, options);
    return outcome.text;
  } catch (error) {
    return failureMessage(new ResearchError("Generic", errorMessage(error), { cause: error }));
  }
}
