import { REPORT_SECTIONS, REPORT_TARGET_WORDS } from "./constants";
import { SearchResult } from "./types";

export const SEARCHER_SYSTEM_PROMPT = `You are a Comprehensive Web Researcher.
Goal: conduct thorough research with a small number of strategic web searches.
You run systematic, multi-angle investigations: overview, details, recent developments,
statistics and expert opinion, so that a writer can build a complete picture from your results.
Use the web_search tool for every search, and request several searches per turn.
Stop searching when the tool reports that the search limit was reached.`;

export const WRITER_SYSTEM_PROMPT = `You are a Comprehensive Research Writer.
You turn search results into detailed, well-organized research reports with clear structure,
balanced analysis and proper citations. You only use the material you are given.`;

const SEARCH_ANGLES = [
  "Main topic overview and background",
  "Current statistics, data, and trends",
  "Recent developments and news",
  "Expert opinions and analysis",
  "Detailed aspects and implications",
];

/**
 * The searcher gets `maxTurns` model turns, so its searches have to be
 * batched: several web_search calls per turn.
 */
export function searchTaskPrompt(query: string, maxSearches: number, maxTurns: number): string {
  const perTurn = Math.ceil(maxSearches / Math.max(1, maxTurns));
  const angles = SEARCH_ANGLES.slice(0, maxSearches)
    .map((angle, index) => `${index + 1}. ${angle}`)
    .join("\n");

  return `Conduct comprehensive research about: ${query}

Execute up to ${maxSearches} strategic searches covering:
${angles}

You have ${maxTurns} turns in total. Issue several web_search calls in the same turn
(about ${perTurn} per turn) so that every search is requested within ${maxTurns} turns.

For each search:
- Use a specific, targeted query distinct from your previous ones
- Focus on authoritative sources
- Gather both quantitative and qualitative data
- Note publication dates and source credibility

When you are done, reply with a short summary of what you found and any gaps.`;
}

export function writerTaskPrompt(query: string, searchContext: string): string {
  const sections = REPORT_SECTIONS
    .map((section) => `  * ${section.title} (${section.minWords}-${section.maxWords} words)`)
    .join("\n");

  return `Create a comprehensive research report about: ${query}

Requirements:
- Target length: ${REPORT_TARGET_WORDS.min}-${REPORT_TARGET_WORDS.max} words
- Use ALL provided search results effectively
- Structure the report with these sections:
${sections}

Content guidelines:
- Include specific data, statistics, and examples
- Cite sources throughout
- Provide balanced analysis with multiple perspectives
- Use clear headings and subheadings
- Keep a professional, informative tone

Format the report as markdown with proper headings.

Research material:
${searchContext}`;
}

/**
 * Search stage output as the writer's sole input.
 */
export function formatSearchContext(findings: SearchResult[], searchNotes: string): string {
  const blocks = findings.map(
    (finding) =>
      `### Search ${finding.sequenceNumber} (${finding.depthUsed} depth): ${finding.query}\n${finding.rawText}`
  );

  if (blocks.length === 0) {
    blocks.push("No search results were gathered.");
  }
  if (searchNotes.trim()) {
    blocks.push(`### Researcher notes\n${searchNotes.trim()}`);
  }
  return blocks.join("\n\n");
}
