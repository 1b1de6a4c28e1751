import { describe, it, expect, vi } from 'vitest';
import { SearchCapability, SearchProvider, truncateResult } from '../../src/research/search-capability';
import { SearchSession } from '../../src/research/search-session';
import { ProviderSearchRequest } from '../../src/research/types';

const noWait = vi.fn(async () => {});

function fakeProvider(respond: (request: ProviderSearchRequest) => string | Promise<string>) {
  const requests: ProviderSearchRequest[] = [];
  const provider: SearchProvider = {
    async search(request) {
      requests.push(request);
      return respond(request);
    },
  };
  return { provider, requests };
}

function capabilityWith(provider: SearchProvider | undefined, session = new SearchSession()) {
  return new SearchCapability({ session, provider, apiKey: 'test-key', sleep: noWait });
}

describe('truncateResult', () => {
  it('leaves a result of exactly 4000 characters untouched', () => {
    const raw = 'a'.repeat(4000);

    expect(truncateResult(raw, 1, 'standard')).toEqual({ text: raw, truncated: false });
  });

  it('cuts a 4001 character result to 4000 and appends a marker', () => {
    const raw = 'a'.repeat(4000) + 'b';
    const { text, truncated } = truncateResult(raw, 3, 'deep');

    expect(truncated).toBe(true);
    expect(text).toBe(
      'a'.repeat(4000) + '\n... [Results truncated at 4000 chars, search 3 using deep depth]'
    );
  });
});

describe('SearchCapability', () => {
  it('uses deep depth on every third search and numbers results in order', async () => {
    const { provider, requests } = fakeProvider((request) => `results for ${request.query}`);
    const capability = capabilityWith(provider);

    const texts: string[] = [];
    for (const query of ['q1', 'q2', 'q3', 'q4', 'q5']) {
      const outcome = await capability.search({ query, outputType: 'searchResults' });
      texts.push(outcome.text);
    }

    expect(requests.map((request) => request.depth)).toEqual([
      'standard',
      'standard',
      'deep',
      'standard',
      'standard',
    ]);
    expect(texts[2]).toBe('Search 3/5 (deep depth):\nresults for q3');
    expect(capability.session.searchCount).toBe(5);
  });

  it('returns the soft limit text on the sixth call without calling the provider', async () => {
    const { provider, requests } = fakeProvider(() => 'ok');
    const capability = capabilityWith(provider);
    for (let i = 0; i < 5; i++) {
      await capability.search({ query: `q${i}`, outputType: 'searchResults' });
    }

    const outcome = await capability.search({ query: 'one more', outputType: 'searchResults' });

    expect(outcome).toEqual({
      kind: 'exhausted',
      text: 'Maximum search limit (5) reached. Please analyze existing results.',
    });
    expect(requests).toHaveLength(5);
    expect(capability.session.searchCount).toBe(5);
  });

  it('reports a missing provider before anything else', async () => {
    const capability = capabilityWith(undefined);

    const outcome = await capability.search({ query: 'q', outputType: 'searchResults' });

    expect(outcome.kind).toBe('error');
    expect(outcome.kind === 'error' && outcome.errorKind).toBe('CapabilityUnavailable');
  });

  it('reports a missing credential', async () => {
    const { provider } = fakeProvider(() => 'ok');
    const capability = new SearchCapability({ session: new SearchSession(), provider, sleep: noWait });

    const outcome = await capability.search({ query: 'q', outputType: 'searchResults' });

    expect(outcome).toEqual({
      kind: 'error',
      errorKind: 'MissingCredential',
      text: 'Error: TAVILY_API_KEY environment variable not set',
    });
  });

  it('absorbs provider failures as text without using the budget', async () => {
    const { provider } = fakeProvider(() => {
      throw new Error('connection reset');
    });
    const capability = capabilityWith(provider);

    const outcome = await capability.search({ query: 'q', outputType: 'searchResults' });

    expect(outcome).toEqual({
      kind: 'error',
      errorKind: 'ProviderError',
      text: 'Error occurred while searching: connection reset',
    });
    expect(capability.session.searchCount).toBe(0);
  });

  it('lets a timeout abort escape instead of reporting it as a failed search', async () => {
    const controller = new AbortController();
    const { provider } = fakeProvider(() => {
      controller.abort();
      throw new Error('Aborted');
    });
    const capability = capabilityWith(provider);

    await expect(capability.search({ query: 'q', outputType: 'searchResults' }, controller.signal)).rejects.toThrow(
      'Aborted'
    );
    expect(capability.session.searchCount).toBe(0);
  });

  it('waits the pacing delay before each provider call', async () => {
    const wait = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
    const { provider } = fakeProvider(() => 'ok');
    const capability = new SearchCapability({
      session: new SearchSession(),
      provider,
      apiKey: 'test-key',
      sleep: wait,
    });

    await capability.search({ query: 'q', outputType: 'searchResults' });

    expect(wait).toHaveBeenCalledWith(1500, undefined);
  });

  it('marks long results as truncated', async () => {
    const { provider } = fakeProvider(() => 'x'.repeat(5000));
    const capability = capabilityWith(provider);

    const outcome = await capability.search({ query: 'long', outputType: 'searchResults' });

    expect(outcome.kind).toBe('result');
    if (outcome.kind === 'result') {
      expect(outcome.result.truncated).toBe(true);
      expect(outcome.result.rawText.startsWith('x'.repeat(4000) + '\n... [Results truncated')).toBe(true);
      expect(outcome.result.sequenceNumber).toBe(1);
    }
  });
});
