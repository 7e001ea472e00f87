import * as path from "path";
import * as fs from "fs";
import chalk from "chalk";

import type { AnalysisDiagnostics, Language, Report } from "./analyzers/types";
import { defaultConfig } from "./config";
import type { AnalyzerConfig } from "./config";
import { AnalysisAbortedError, ArchiveTooLargeError } from "./errors";
import { withWorkspace } from "./sandbox";
import { listSourceFiles } from "./inventory";
import { extractAll } from "./analyzers/static/extractor";
import { LocalizationIndex } from "./analyzers/search/localizationIndex";
import { splitRequirements } from "./requirements";
import { localize } from "./scoring";
import type { Summarizer, TestGenerator, TestRunner } from "./analyzers/llm/collaborators";
import { HeuristicSummarizer, HeuristicTestGenerator } from "./analyzers/llm/heuristic";
import { createApiCompletion, createCliCompletion, LlmSummarizer, LlmTestGenerator } from "./analyzers/llm/claude";
import type { LlmProvider } from "./analyzers/llm/claude";
import { ReportAssembler } from "./reporter/assembler";
import { writeJsonReport } from "./reporter/json";
import { writeMarkdownReport } from "./reporter/markdown";

export type ProgressFn = (message: string) => void;

export type AnalyzeOptions = {
  archive: Uint8Array;
  requirementText: string;
  config?: AnalyzerConfig;
  summarizer?: Summarizer;
  testGenerator?: TestGenerator;
  testRunner?: TestRunner;
  verify?: boolean;
  signal?: AbortSignal;
  onProgress?: ProgressFn;
};

export type AnalysisOutcome = {
  report: Report;
  diagnostics: AnalysisDiagnostics;
};

/**
 * Runs one analysis end to end: unpack, inventory, extract, localize,
 * assemble. The workspace is gone by the time this settles, whether it
 * resolves, rejects or is aborted.
 */
export async function analyzeArchive(options: AnalyzeOptions): Promise<AnalysisOutcome> {
  const startTime = Date.now();
  const config = options.config ?? defaultConfig;
  const { signal, onProgress } = options;
  throwIfAborted(signal, "startup");

  const requirements = splitRequirements(options.requirementText);
  onProgress?.(`Found ${requirements.length} requirement(s) in the description`);

  const extracted = await withWorkspace(options.archive, config, async (handle) => {
    onProgress?.(`Unpacked ${handle.filesWritten} file(s)`);
    throwIfAborted(signal, "inventory");
    const inventory = await listSourceFiles(handle, { ignoredDirectories: config.ignoredDirectories });
    onProgress?.(`Found ${inventory.files.length} source file(s)`);

    throwIfAborted(signal, "extraction");
    const results = await extractAll(inventory.files, { excerptChars: config.excerptChars });
    throwIfAborted(signal, "extraction");
    return {
      inventory,
      results,
      truncated: [...handle.truncated],
      skippedLinks: [...handle.skippedLinks],
    };
  }, signal);

  const { inventory, results } = extracted;
  const units = results.flatMap((result) => result.units);
  onProgress?.(`Extracted ${units.length} code unit(s)`);

  throwIfAborted(signal, "localization");
  const index = LocalizationIndex.build(units);
  const evidence = localize(requirements, index, config);
  const located = new Set(evidence.map((item) => item.requirementOrdinal)).size;
  onProgress?.(`Located ${located} of ${requirements.length} requirement(s)`);

  throwIfAborted(signal, "report assembly");
  const languages: Language[] = [...new Set(inventory.files.map((file) => file.language))].sort();
  const assembler = new ReportAssembler(
    {
      summarizer: options.summarizer ?? new HeuristicSummarizer(),
      testGenerator: options.testGenerator ?? new HeuristicTestGenerator(),
      testRunner: options.testRunner,
    },
    { topK: config.topK, onProgress }
  );
  const report = await assembler.build(requirements, evidence, {
    languages,
    manifests: inventory.manifests,
    verify: options.verify ?? false,
  });

  const diagnostics: AnalysisDiagnostics = {
    totalFiles: inventory.files.length,
    totalLines: inventory.files.reduce((sum, file) => sum + file.lineCount, 0),
    totalUnits: units.length,
    requirementCount: requirements.length,
    unreadableFiles: inventory.unreadable,
    partiallyExtractedFiles: results.flatMap((result) =>
      result.anomaly ? [{ path: result.filePath, line: result.anomaly.line, reason: result.anomaly.reason }] : []
    ),
    truncatedEntries: extracted.truncated,
    skippedLinks: extracted.skippedLinks,
    manifests: inventory.manifests,
    durationMs: Date.now() - startTime,
  };

  return { report, diagnostics };
}

function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new AnalysisAbortedError(stage);
  }
}

export type Collaborators = {
  summarizer: Summarizer;
  testGenerator: TestGenerator;
};

/** The CLI's choice of collaborators. The API provider needs ANTHROPIC_API_KEY and falls back without it. */
export function selectCollaborators(
  provider: LlmProvider | "none",
  env: NodeJS.ProcessEnv,
  onNotice?: ProgressFn
): Collaborators {
  if (provider === "none") {
    return { summarizer: new HeuristicSummarizer(), testGenerator: new HeuristicTestGenerator() };
  }
  if (provider === "api") {
    const apiKey = env.ANTHROPIC_API_KEY;
    if (!apiKey) {
      onNotice?.("No ANTHROPIC_API_KEY set, using heuristic summaries instead");
      return { summarizer: new HeuristicSummarizer(), testGenerator: new HeuristicTestGenerator() };
    }
    const complete = createApiCompletion(apiKey);
    return { summarizer: new LlmSummarizer(complete), testGenerator: new LlmTestGenerator(complete) };
  }
  const complete = createCliCompletion();
  return { summarizer: new LlmSummarizer(complete), testGenerator: new LlmTestGenerator(complete) };
}

export type ScanOptions = {
  archivePath: string;
  requirementText: string;
  outputDir: string;
  llmProvider: LlmProvider | "none";
  verify: boolean;
  config: AnalyzerConfig;
};

export async function scan(options: ScanOptions): Promise<Report> {
  const archivePath = path.resolve(options.archivePath);

  console.log(chalk.bold("\nfeaturemap: requirement to code localization\n"));
  console.log(`Archive:   ${archivePath}`);
  console.log(`Output:    ${path.resolve(options.outputDir)}`);
  const llmLabel = options.llmProvider === "cli" ? "Claude CLI" : options.llmProvider === "api" ? "API" : "heuristic";
  console.log(`LLM:       ${llmLabel}\n`);

  const log: ProgressFn = (message) => console.log(chalk.gray(`  ${message}`));
  const collaborators = selectCollaborators(options.llmProvider, process.env, (message) => console.log(chalk.yellow(`  ${message}`)));

  const archiveSize = fs.statSync(archivePath).size;
  if (archiveSize > options.config.maxArchiveBytes) {
    throw new ArchiveTooLargeError("compressed", archiveSize, options.config.maxArchiveBytes);
  }
  const archive = fs.readFileSync(archivePath);
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);

  console.log(chalk.cyan("Analyzing..."));
  const outcome = await analyzeArchive({
    archive,
    requirementText: options.requirementText,
    config: options.config,
    ...collaborators,
    verify: options.verify,
    signal: controller.signal,
    onProgress: log,
  }).finally(() => process.removeListener("SIGINT", onInterrupt));

  const { report, diagnostics } = outcome;
  const jsonPath = writeJsonReport(report, options.outputDir);
  const mdPath = writeMarkdownReport(report, { archiveName: path.basename(archivePath), diagnostics }, options.outputDir);

  console.log("");
  for (const [index, entry] of report.feature_analysis.entries()) {
    const status = entry.implementation_location.length > 0 ? chalk.green("located") : chalk.yellow("not found");
    console.log(`  ${(index + 1).toString().padStart(2)}. ${entry.feature_description} ${chalk.gray("-")} ${status}`);
    for (const location of entry.implementation_location) {
      console.log(chalk.gray(`      ${location.file}  ${location.function}  (${location.lines})`));
    }
  }

  const degraded = diagnostics.unreadableFiles.length + diagnostics.partiallyExtractedFiles.length +
    diagnostics.truncatedEntries.length + diagnostics.skippedLinks.length;
  if (degraded > 0) {
    console.log(chalk.yellow(`\n  ${degraded} file(s) skipped or partially extracted, see the Markdown report`));
  }

  console.log(chalk.gray(`\nReports written to:`));
  console.log(chalk.gray(`  JSON:     ${jsonPath}`));
  console.log(chalk.gray(`  Markdown: ${mdPath}`));
  console.log(chalk.gray(`  Duration: ${(diagnostics.durationMs / 1000).toFixed(1)}s\n`));

  return report;
}
