import { RoleConfig } from './types';

export const MAX_SEARCHES = 5;
export const DEEP_SEARCH_INTERVAL = 3;        // Every 3rd search runs deep
export const MAX_RESULT_CHARS = 4000;
export const SEARCH_PACING_MS = 1500;
export const SEARCH_MAX_RESULTS = 5;

export const SUBSTANTIAL_REPORT_CHARS = 500;
export const COMPREHENSIVE_REPORT_WORDS = 1000;
export const WORDS_PER_PAGE = 500;

export const MAX_RETRIES = 3;
export const RETRY_DELAY_MS = 3000;
export const PIPELINE_TIMEOUT_MS = 600_000;

export const SEARCHER_ROLE: RoleConfig = {
  name: 'searcher',
  temperature: 0.4,
  maxTokens: 4000,
  requestTimeoutMs: 120_000,
  maxRetries: 3,
  stageTimeoutMs: 300_000,
  maxIterations: 3,
};

export const WRITER_ROLE: RoleConfig = {
  name: 'writer',
  temperature: 0.4,
  maxTokens: 4000,
  requestTimeoutMs: 120_000,
  maxRetries: 3,
  stageTimeoutMs: 240_000,
  maxIterations: 2,
};

export interface ReportSection {
  title: string;
  minWords: number;
  maxWords: number;
}

export const REPORT_SECTIONS: readonly ReportSection[] = [
  { title: 'Executive Summary', minWords: 150, maxWords: 200 },
  { title: 'Introduction & Background', minWords: 300, maxWords: 400 },
  { title: 'Key Findings & Analysis', minWords: 600, maxWords: 800 },
  { title: 'Current Trends & Developments', minWords: 300, maxWords: 400 },
  { title: 'Conclusion & Implications', minWords: 200, maxWords: 300 },
];

export const REPORT_TARGET_WORDS = { min: 1500, max: 2000 } as const;
