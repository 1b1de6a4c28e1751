import { Annotation, MessagesAnnotation } from '@langchain/langgraph';
import { SearchResult } from './types';

/**
 * Search Stage State
 *
 * The searcher's conversation plus every search result gathered so far.
 * `budgetExhausted` is the structured stop signal the stage router reads.
 */
export const SearchStageState = Annotation.Root({
  messages: MessagesAnnotation.spec.messages,
  findings: Annotation<SearchResult[]>({
    reducer: (current, update) => [...current, ...update],
    default: () => [],
  }),
  budgetExhausted: Annotation<boolean>({
    reducer: (_, update) => update,
    default: () => false,
  }),
});

/**
 * Research Pipeline State
 *
 * Stage 1 fills `findings` and `searchNotes`; stage 2 reads them and
 * writes `report`.
 */
export const ResearchState = Annotation.Root({
  query: Annotation<string>,
  findings: Annotation<SearchResult[]>({
    reducer: (current, update) => [...current, ...update],
    default: () => [],
  }),
  searchNotes: Annotation<string>({
    reducer: (_, update) => update,
    default: () => '',
  }),
  report: Annotation<string>({
    reducer: (_, update) => update,
    default: () => '',
  }),
});
