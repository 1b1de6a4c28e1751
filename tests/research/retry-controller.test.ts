import { describe, it, expect, vi } from 'vitest';
import { AIMessage } from '@langchain/core/messages';
import { ResearchError } from '../../src/research/errors';
import { AttemptContext, AttemptRunner, createPipelineRunner } from '../../src/research/pipeline';
import {
  backoffDelay,
  EMPTY_QUERY_MESSAGE,
  executeResearch,
  limitedContentMessage,
  RATE_LIMITED_MESSAGE,
  runResearch,
} from '../../src/research/retry-controller';
import { SearchProvider } from '../../src/research/search-capability';
import { loadConfig } from '../../src/shared/config';
import { RoleModel } from '../../src/shared/utils/models';

const quietLogger = { log: vi.fn(), warn: vi.fn() };
const longReport = Array.from({ length: 1800 }, (_, index) => `word${index}`).join(' ');

function recordingSleep() {
  const waits: number[] = [];
  const sleep = async (ms: number) => {
    waits.push(ms);
  };
  return { waits, sleep };
}

describe('backoffDelay', () => {
  it('starts the first attempt immediately', () => {
    expect(backoffDelay(0, 3000)).toBe(0);
    expect(backoffDelay(0, 3000, 'RateLimited')).toBe(0);
  });

  it('grows linearly after ordinary failures', () => {
    expect(backoffDelay(1, 3000, 'Generic')).toBe(3000);
    expect(backoffDelay(2, 3000, 'Generic')).toBe(6000);
  });

  it('waits one step longer after a rate limit', () => {
    expect(backoffDelay(1, 3000, 'RateLimited')).toBe(6000);
    expect(backoffDelay(2, 3000, 'RateLimited')).toBe(9000);
  });
});

describe('executeResearch', () => {
  it('returns a comprehensive report unchanged', async () => {
    const { waits, sleep } = recordingSleep();
    const runAttempt = vi.fn(async (_context: AttemptContext) => longReport);

    const outcome = await executeResearch('X', { runAttempt, sleep, logger: quietLogger });

    expect(outcome.status).toBe('succeeded');
    expect(outcome.text).toBe(longReport);
    expect(outcome.report?.wordCount).toBe(1800);
    expect(outcome.report?.comprehensive).toBe(true);
    expect(outcome.attempts).toHaveLength(1);
    expect(waits).toEqual([]);
  });

  it('retries missing credentials with a linear delay and names the missing value', async () => {
    const { waits, sleep } = recordingSleep();
    const runAttempt = vi.fn(async (_context: AttemptContext): Promise<string> => {
      throw new ResearchError('MissingCredential', 'TAVILY_API_KEY environment variable is not set');
    });

    const outcome = await executeResearch('X', { runAttempt, sleep, logger: quietLogger });

    expect(runAttempt).toHaveBeenCalledTimes(3);
    expect(waits).toEqual([3000, 6000]);
    expect(outcome.status).toBe('failed');
    expect(outcome.errorKind).toBe('MissingCredential');
    expect(outcome.text).toBe(
      'Configuration Error: TAVILY_API_KEY environment variable is not set\n\n'
        + 'Set the missing value in your environment or .env file, then try again.'
    );
    expect(outcome.attempts.map((attempt) => attempt.outcome.status)).toEqual([
      'retryableFailure',
      'retryableFailure',
      'retryableFailure',
    ]);
  });

  it('stops at the first configuration failure when failing fast', async () => {
    const runAttempt = vi.fn(async (_context: AttemptContext): Promise<string> => {
      throw new ResearchError('MissingCredential', 'TAVILY_API_KEY environment variable is not set');
    });

    const outcome = await executeResearch('X', {
      runAttempt,
      sleep: async () => {},
      logger: quietLogger,
      failFastOnConfigurationError: true,
    });

    expect(runAttempt).toHaveBeenCalledTimes(1);
    expect(outcome.attempts[0].outcome.status).toBe('fatalFailure');
    expect(outcome.status).toBe('failed');
  });

  it('recovers from rate limits with a fresh search budget on every attempt', async () => {
    const { waits, sleep } = recordingSleep();
    const countsAtStart: number[] = [];
    const runAttempt: AttemptRunner = async ({ session, attemptIndex }) => {
      countsAtStart.push(session.searchCount);
      session.recordCompletedSearch();
      session.recordCompletedSearch();
      if (attemptIndex < 2) {
        throw new ResearchError('RateLimited', 'The searcher model is rate limited: rate limit exceeded');
      }
      return longReport;
    };

    const outcome = await executeResearch('X', { runAttempt, sleep, logger: quietLogger });

    expect(outcome.status).toBe('succeeded');
    expect(outcome.text).toBe(longReport);
    expect(countsAtStart).toEqual([0, 0, 0]);
    expect(waits).toEqual([6000, 9000]);
    expect(outcome.attempts.map((attempt) => attempt.delayMs)).toEqual([0, 6000, 9000]);
    expect(outcome.attempts.map((attempt) => attempt.searchesUsed)).toEqual([2, 2, 2]);
  });

  it('returns a short report verbatim inside a limited-content notice without retrying', async () => {
    const shortBody = 'b'.repeat(300);
    const runAttempt = vi.fn(async (_context: AttemptContext) => shortBody);

    const outcome = await executeResearch('X', { runAttempt, sleep: async () => {}, logger: quietLogger });

    expect(runAttempt).toHaveBeenCalledTimes(1);
    expect(outcome.status).toBe('limited');
    expect(outcome.errorKind).toBe('ContentTooShort');
    expect(outcome.text).toBe(
      `Research completed but content seems limited. Here's what was found:\n\n${shortBody}\n\n`
        + '[Note: For more comprehensive results, try refining your query or checking API limits]'
    );
    expect(outcome.text).toBe(limitedContentMessage(shortBody));
  });

  it('gives the rate limit message once attempts run out', async () => {
    const runAttempt = async (): Promise<string> => {
      throw new ResearchError('RateLimited', 'The writer model is rate limited: quota exceeded');
    };

    const outcome = await executeResearch('X', { runAttempt, sleep: async () => {}, logger: quietLogger });

    expect(outcome.text).toBe(RATE_LIMITED_MESSAGE);
  });

  it('wraps unexpected failures with troubleshooting tips', async () => {
    const runAttempt = async (): Promise<string> => {
      throw new TypeError('cannot read properties of undefined');
    };

    const outcome = await executeResearch('X', { runAttempt, sleep: async () => {}, logger: quietLogger });

    expect(outcome.errorKind).toBe('Generic');
    expect(outcome.text.startsWith('Error: cannot read properties of undefined\n\nTroubleshooting tips:\n1.')).toBe(true);
  });

  it('points at the search provider when it cannot be loaded', async () => {
    const runAttempt = async (): Promise<string> => {
      throw new ResearchError('CapabilityUnavailable', 'Tavily search provider could not be loaded: missing');
    };

    const outcome = await executeResearch('X', { runAttempt, sleep: async () => {}, logger: quietLogger });

    expect(outcome.text).toBe(
      'Search Provider Unavailable: Tavily search provider could not be loaded: missing\n'
        + 'Please install the search provider: npm install @langchain/tavily'
    );
  });

  it('rejects an empty query without running an attempt', async () => {
    const runAttempt = vi.fn(async (_context: AttemptContext) => longReport);

    const outcome = await executeResearch('   ', { runAttempt, logger: quietLogger });

    expect(outcome).toEqual({ status: 'rejected', text: EMPTY_QUERY_MESSAGE, attempts: [] });
    expect(runAttempt).not.toHaveBeenCalled();
  });
});

describe('runResearch', () => {
  it('runs the whole pipeline and returns the report text', async () => {
    let turn = 0;
    const searcher: RoleModel = {
      invoke: async () => {
        turn += 1;
        return turn === 1
          ? new AIMessage({
            content: '',
            tool_calls: [{ name: 'web_search', args: { query: 'overview' }, id: 'call-overview', type: 'tool_call' }],
          })
          : new AIMessage('Searched enough.');
      },
    };
    const writer: RoleModel = { invoke: async () => new AIMessage(longReport) };
    const provider: SearchProvider = { search: async () => 'an overview' };

    const runAttempt = createPipelineRunner({
      config: loadConfig({ TAVILY_API_KEY: 'test-key' }),
      models: { searcher, writer },
      createSearchProvider: async () => provider,
      sleep: async () => {},
    });

    await expect(runResearch('X', { runAttempt, logger: quietLogger })).resolves.toBe(longReport);
  });

  it('always resolves to text', async () => {
    const logger = {
      log: vi.fn(),
      warn: () => {
        throw new Error('logger broke');
      },
    };
    const runAttempt = async (): Promise<string> => {
      throw new Error('pipeline broke');
    };

    const text = await runResearch('X', { runAttempt, sleep: async () => {}, logger });

    expect(text.startsWith('Error: logger broke')).toBe(true);
  });
});
