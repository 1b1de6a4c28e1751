import { DEEP_SEARCH_INTERVAL, MAX_SEARCHES } from './constants';
import { SearchDepth } from './types';

/**
 * Depth for the Nth search of an attempt (1-indexed).
 */
export const depthForSequence = (sequenceNumber: number): SearchDepth =>
  sequenceNumber % DEEP_SEARCH_INTERVAL === 0 ? 'deep' : 'standard';

/**
 * Search budget for one pipeline attempt.
 *
 * The count only grows between resets and only counts searches that
 * completed. Searches run one at a time, so nothing guards the counter.
 */
export class SearchSession {
  private count = 0;

  constructor(readonly maxSearches: number = MAX_SEARCHES) {}

  get searchCount(): number {
    return this.count;
  }

  get exhausted(): boolean {
    return this.count >= this.maxSearches;
  }

  reset(): void {
    this.count = 0;
  }

  checkAndReserve(): boolean {
    return this.count < this.maxSearches;
  }

  recordCompletedSearch(): number {
    this.count += 1;
    return this.count;
  }

  /** Depth the next completed search will be recorded with. */
  nextDepth(): SearchDepth {
    return depthForSequence(this.count + 1);
  }
}
