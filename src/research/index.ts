export * from "./types";
export * from "./constants";
export { ResearchError } from "./errors";
export { SearchSession, depthForSequence } from "./search-session";
export { SearchCapability, truncateResult } from "./search-capability";
export type { SearchProvider } from "./search-capability";
export { createWebSearchTool, WEB_SEARCH_TOOL_NAME } from "./tools";
export { createResearchPipeline, createPipelineRunner } from "./pipeline";
export type { AttemptRunner, PipelineRunnerOptions } from "./pipeline";
export { executeResearch, runResearch, backoffDelay } from "./retry-controller";
export type { ResearchOptions } from "./retry-controller";
export * from "./report";
export { ResearchProgressHandler, describeProgressEvent } from "./progress";
export type { ResearchProgressEvent } from "./progress";
export { loadTavilyProvider, tavilyProviderLoader } from "./providers";
export type { SearchProviderFactory } from "./providers";
