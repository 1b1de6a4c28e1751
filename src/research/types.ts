/**
 * Type Definitions for the Research Pipeline
 *
 * These types describe the data that flows between the search stage, the
 * synthesis stage and the retry controller.
 */

export type SearchDepth = 'standard' | 'deep';

export type SearchOutputType = 'searchResults' | 'sourcedAnswer' | 'structured';

/**
 * What the search role asks for. Depth is not part of the request: the
 * capability derives it from the call's sequence number.
 */
export interface SearchRequest {
  query: string;
  outputType: SearchOutputType;
}

/**
 * What the capability hands to the provider.
 */
export interface ProviderSearchRequest extends SearchRequest {
  depth: SearchDepth;
}

export interface SearchResult {
  query: string;
  rawText: string;                       // Provider text, already truncated when `truncated` is set
  truncated: boolean;
  sequenceNumber: number;                // 1-indexed position within the attempt
  depthUsed: SearchDepth;
}

export type SearchErrorKind = 'CapabilityUnavailable' | 'MissingCredential' | 'ProviderError' | 'InvalidArguments';

/**
 * Outcome of one search call. Every variant carries the text shown to the
 * search role, so a failed or denied call never aborts the stage.
 */
export type SearchOutcome =
  | { kind: 'result'; result: SearchResult; text: string }
  | { kind: 'exhausted'; text: string }
  | { kind: 'error'; errorKind: SearchErrorKind; text: string };

export type ErrorKind =
  | SearchErrorKind
  | 'InvalidConfiguration'
  | 'RateLimited'
  | 'Generic'
  | 'ContentTooShort';

/**
 * Budgets and sampling settings for one agent role.
 */
export interface RoleConfig {
  name: 'searcher' | 'writer';
  temperature: number;
  maxTokens: number;
  requestTimeoutMs: number;              // Per model request
  maxRetries: number;                    // Retries inside the model client
  stageTimeoutMs: number;                // Wall clock for the whole stage
  maxIterations: number;                 // Model turns the role may take
}

export interface ResearchReport {
  query: string;
  bodyText: string;
  wordCount: number;
  substantial: boolean;
  comprehensive: boolean;
}

export type AttemptOutcome =
  | { status: 'success'; report: ResearchReport }
  | { status: 'retryableFailure'; errorKind: ErrorKind; message: string }
  | { status: 'fatalFailure'; errorKind: ErrorKind; message: string };

export interface PipelineAttempt {
  attemptIndex: number;
  delayMs: number;                       // Backoff waited before this attempt
  searchesUsed: number;
  outcome: AttemptOutcome;
}

export type ResearchStatus = 'succeeded' | 'limited' | 'failed' | 'rejected';

export interface ResearchOutcome {
  status: ResearchStatus;
  text: string;
  report?: ResearchReport;
  errorKind?: ErrorKind;                 // Why the run failed, or ContentTooShort for a limited report
  attempts: PipelineAttempt[];
}
