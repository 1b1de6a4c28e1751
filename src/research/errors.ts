import { ErrorKind } from './types';

/**
 * Error carrying a research error kind.
 *
 * Stage and pipeline failures are raised as ResearchError so the retry
 * controller can decide on the kind alone.
 */
export class ResearchError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ResearchError';
    this.kind = kind;
  }
}

const RATE_LIMIT_PATTERN = /rate[\s_-]?limit|overloaded|quota|too many requests|resource[\s_-]?exhausted/i;
const RATE_LIMIT_STATUSES = new Set([429, 529]);

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Recognises provider overload, quota and rate-limit failures.
 * Used only at the language-model boundary.
 */
export function isRateLimitError(error: unknown): boolean {
  if (typeof error === 'object' && error !== null) {
    if ('status' in error && typeof error.status === 'number' && RATE_LIMIT_STATUSES.has(error.status)) {
      return true;
    }
    if ('code' in error && error.code === 429) {
      return true;
    }
  }
  return RATE_LIMIT_PATTERN.test(errorMessage(error));
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error
    && (error.name === 'AbortError' || error.name === 'TimeoutError' || error.message === 'Aborted');
}

export function toResearchError(error: unknown): ResearchError {
  if (error instanceof ResearchError) {
    return error;
  }
  return new ResearchError('Generic', errorMessage(error), { cause: error });
}

export const CONFIGURATION_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'CapabilityUnavailable',
  'MissingCredential',
  'InvalidConfiguration',
]);
