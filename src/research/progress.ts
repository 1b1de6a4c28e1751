import { BaseCallbackHandler } from "@langchain/core/callbacks/base";
import { dispatchCustomEvent } from "@langchain/core/callbacks/dispatch";
import { RunnableConfig } from "@langchain/core/runnables";
import { z } from "zod";
import * as fs from "fs";

const StageSchema = z.enum(["search", "synthesis"]);

export const ProgressEventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("stage_started"), stage: StageSchema, query: z.string() }),
  z.object({
    type: z.literal("search_completed"),
    sequenceNumber: z.number(),
    maxSearches: z.number(),
    depth: z.enum(["standard", "deep"]),
    query: z.string(),
    truncated: z.boolean(),
  }),
  z.object({ type: z.literal("search_failed"), query: z.string(), reason: z.string() }),
  z.object({ type: z.literal("search_budget_exhausted"), maxSearches: z.number() }),
  z.object({ type: z.literal("stage_completed"), stage: StageSchema, detail: z.string() }),
]);

export type ResearchProgressEvent = z.infer<typeof ProgressEventSchema>;

/**
 * Emits a progress event from inside a graph node. Without callbacks
 * there is nobody listening, and no parent run to attach the event to.
 */
export async function reportProgress(event: ResearchProgressEvent, config?: Partial<RunnableConfig>): Promise<void> {
  if (!config?.callbacks) {
    return;
  }
  await dispatchCustomEvent(event.type, event, config);
}

export function describeProgressEvent(event: ResearchProgressEvent): string {
  switch (event.type) {
    case "stage_started":
      return event.stage === "search"
        ? `🌐 Conducting web searches for "${event.query}"...`
        : "📝 Analyzing and writing report...";
    case "search_completed":
      return `🔎 Search ${event.sequenceNumber}/${event.maxSearches} (${event.depth} depth): ${event.query}${event.truncated ? " [truncated]" : ""}`;
    case "search_failed":
      return `⚠️  Search failed for "${event.query}": ${event.reason}`;
    case "search_budget_exhausted":
      return `🛑 Search limit of ${event.maxSearches} reached`;
    case "stage_completed":
      return `✅ ${event.stage === "search" ? "Search" : "Synthesis"} stage complete (${event.detail})`;
  }
}

interface ProgressHandlerOptions {
  logFilePath?: string;
  print?: (line: string) => void;
}

/**
 * ResearchProgressHandler - prints pipeline progress events
 *
 * Listens for the custom events the pipeline nodes dispatch, prints one
 * line per event, and appends them as JSON lines to a log file when a
 * path is given. Other custom events are ignored.
 */
export class ResearchProgressHandler extends BaseCallbackHandler {
  name = "research_progress_handler" as const;
  awaitHandlers = true;

  private readonly print: (line: string) => void;
  private logStream?: fs.WriteStream;

  constructor(options: ProgressHandlerOptions = {}) {
    super();
    this.print = options.print ?? ((line) => console.log(line));
    if (options.logFilePath) {
      this.logStream = fs.createWriteStream(options.logFilePath, { flags: "a" });
    }
  }

  async handleCustomEvent(eventName: string, data: unknown, runId: string): Promise<void> {
    const parsed = ProgressEventSchema.safeParse(data);
    if (!parsed.success || parsed.data.type !== eventName) {
      return;
    }

    this.logStream?.write(
      JSON.stringify({ timestamp: new Date().toISOString(), runId, ...parsed.data }) + "\n"
    );
    this.print(describeProgressEvent(parsed.data));
  }

  close() {
    this.logStream?.end();
  }
}
