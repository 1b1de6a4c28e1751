#!/usr/bin/env node
import * as readline from "readline";
import * as fs from "fs";
import * as path from "path";
import { loadConfig } from "./shared/config";
import { errorMessage } from "./research/errors";
import { ResearchProgressHandler } from "./research/progress";
import {
  exportableReport,
  exportFileName,
  renderExport,
  reportStatistics,
  reportSummaryLine,
  ExportFormat,
} from "./research/report";
import { executeResearch } from "./research/retry-controller";
import { ResearchReport } from "./research/types";

export * from "./research";
export { loadConfig } from "./shared/config";

const EXPORT_FORMATS: ExportFormat[] = ["txt", "md"];

interface CliSettings {
  outputDir: string;
  eventLogPath?: string;
}

function cliSettings(): CliSettings {
  try {
    const { outputDir, eventLogPath } = loadConfig();
    return { outputDir, eventLogPath };
  } catch (error) {
    // Every attempt reports the same problem with remediation text
    console.warn(`⚠️  ${errorMessage(error)}`);
    return { outputDir: "reports" };
  }
}

/**
 * Writes the report in every export format and returns the file paths.
 */
export function saveExports(report: ResearchReport, outputDir: string, generatedAt: Date = new Date()): string[] {
  fs.mkdirSync(outputDir, { recursive: true });
  const baseName = exportFileName(generatedAt);

  return EXPORT_FORMATS.map((format) => {
    const filePath = path.join(outputDir, `${baseName}.${format}`);
    fs.writeFileSync(filePath, renderExport(report, format, generatedAt), "utf-8");
    return filePath;
  });
}

async function research(query: string, settings: CliSettings) {
  const progress = new ResearchProgressHandler({ logFilePath: settings.eventLogPath });

  try {
    const outcome = await executeResearch(query, { pipeline: { callbacks: [progress] } });

    console.log("\n" + "=".repeat(60));
    console.log(outcome.text);
    console.log("=".repeat(60));

    const report = exportableReport(outcome);
    if (report) {
      const stats = reportStatistics(report);
      console.log(`\n${reportSummaryLine(report)}`);
      console.log(`📊 ${stats.words} words | 📄 ${stats.characters} characters | 📖 ~${stats.estimatedPages} pages`);

      const files = saveExports(report, settings.outputDir);
      files.forEach((file) => console.log(`💾 Saved ${file}`));
    }
  } finally {
    progress.close();
  }
}

async function main() {
  console.log("🔍 Deep Research Pipeline");
  console.log("=".repeat(60));
  console.log("Ask a research question for a comprehensive 2-3 page report.");
  console.log("Type 'exit' or 'quit' to leave.");

  const settings = cliSettings();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "\n❓ Research question: ",
  });

  rl.prompt();

  rl.on("line", async (line) => {
    const query = line.trim();

    if (query.toLowerCase() === "exit" || query.toLowerCase() === "quit") {
      rl.close();
      return;
    }

    rl.pause();
    try {
      await research(query, settings);
    } catch (error) {
      console.error(`❌ ${errorMessage(error)}`);
    }
    rl.resume();
    rl.prompt();
  });

  rl.on("close", () => {
    console.log("\n👋 Session ended.");
    process.exit(0);
  });
}

if (require.main === module) {
  main().catch(console.error);
}
