import { describe, it, expect } from 'vitest';
import { formatTavilyResponse } from '../../../src/research/providers/tavily';

const response = {
  query: 'solid state batteries',
  answer: 'They replace the liquid electrolyte with a solid one.',
  results: [
    { title: 'Battery basics', url: 'https://example.com/a', content: 'Solid electrolytes explained.', score: 0.9 },
    { title: 'Market outlook', url: 'https://example.com/b', content: 'Production forecasts.', score: 0.7 },
  ],
};

describe('formatTavilyResponse', () => {
  it('lists results with their URLs', () => {
    expect(formatTavilyResponse(response, 'searchResults')).toBe(
      '1. Battery basics\n   URL: https://example.com/a\n   Solid electrolytes explained.\n\n'
        + '2. Market outlook\n   URL: https://example.com/b\n   Production forecasts.'
    );
  });

  it('renders a sourced answer', () => {
    expect(formatTavilyResponse(response, 'sourcedAnswer')).toBe(
      'Answer: They replace the liquid electrolyte with a solid one.\n\nSources:\n'
        + '1. Battery basics (https://example.com/a)\n2. Market outlook (https://example.com/b)'
    );
  });

  it('serves the structured output type as JSON', () => {
    const text = formatTavilyResponse(response, 'structured');

    expect(JSON.parse(text)).toEqual(response);
  });

  it('says so when there are no results', () => {
    expect(formatTavilyResponse({ query: 'nothing', results: [] }, 'searchResults')).toBe('No results found.');
  });

  it('passes plain text through', () => {
    expect(formatTavilyResponse('already text', 'searchResults')).toBe('already text');
  });

  it('raises error responses so they count as provider failures', () => {
    expect(() => formatTavilyResponse({ error: new Error('invalid key') }, 'searchResults')).toThrow(
      'Tavily search failed: invalid key'
    );
  });

  it('rejects responses of an unknown shape', () => {
    expect(() => formatTavilyResponse({ results: 'nope' }, 'searchResults')).toThrow(
      'Tavily search returned an unexpected response'
    );
  });
});
