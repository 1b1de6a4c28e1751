import { COMPREHENSIVE_REPORT_WORDS, SUBSTANTIAL_REPORT_CHARS, WORDS_PER_PAGE } from "./constants";
import { ResearchOutcome, ResearchReport } from "./types";

export type ExportFormat = "txt" | "md";

/**
 * Drops emphasis, heading and code markers and reduces links to their text.
 */
export function stripMarkdown(text: string): string {
  return text
    .replace(/[*#`]/g, "")
    .replace(/\[([^\]]+)\]\([^)]+\)/g, "$1");
}

export function countWords(text: string): number {
  return stripMarkdown(text).split(/\s+/).filter((word) => word.length > 0).length;
}

export function buildReport(query: string, bodyText: string): ResearchReport {
  const wordCount = countWords(bodyText);
  return {
    query,
    bodyText,
    wordCount,
    substantial: bodyText.length >= SUBSTANTIAL_REPORT_CHARS,
    comprehensive: wordCount >= COMPREHENSIVE_REPORT_WORDS,
  };
}

export const estimatePages = (wordCount: number): number =>
  Math.max(1, Math.round(wordCount / WORDS_PER_PAGE));

export interface ReportStatistics {
  words: number;
  characters: number;
  estimatedPages: number;
}

export function reportStatistics(report: ResearchReport): ReportStatistics {
  return {
    words: report.wordCount,
    characters: report.bodyText.length,
    estimatedPages: estimatePages(report.wordCount),
  };
}

const pad = (value: number) => String(value).padStart(2, "0");

function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
    + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * e.g. research_report_20250314_093005, in local time
 */
export function exportFileName(date: Date): string {
  return `research_report_${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
    + `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * Renders the report for download. Markdown keeps the body as written;
 * plain text gets a header and loses the markdown markers.
 */
export function renderExport(report: ResearchReport, format: ExportFormat, generatedAt: Date): string {
  if (format === "md") {
    return report.bodyText;
  }

  return [
    `Research Query: ${report.query}`,
    `Generated: ${formatTimestamp(generatedAt)}`,
    `Word Count: ${report.wordCount} words`,
    "",
    stripMarkdown(report.bodyText),
  ].join("\n");
}

/**
 * The report worth saving from a run: a full report, or the body behind a
 * limited-content notice.
 */
export function exportableReport(outcome: ResearchOutcome): ResearchReport | undefined {
  return outcome.status === "succeeded" || outcome.status === "limited" ? outcome.report : undefined;
}

export function reportSummaryLine(report: ResearchReport): string {
  const words = report.wordCount.toLocaleString("en-US");
  return report.comprehensive
    ? `✅ Comprehensive report generated: ${words} words`
    : `⚠️  Report generated but may be shorter than expected: ${words} words`;
}
