#!/usr/bin/env node

import * as fs from "fs";
import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";

import { resolveConfig } from "./config";
import { AnalysisError } from "./errors";
import { scan } from "./scanner";

type AnalyzeCommandOptions = {
  requirement?: string;
  requirementFile?: string;
  outputDir: string;
  llmProvider: string;
  verify: boolean;
  topK?: number;
  minScore?: number;
  maxArchiveMb?: number;
  maxFileKb?: number;
};

const MiB = 1024 * 1024;

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not a number.`);
  }
  return parsed;
}

function readRequirementText(options: AnalyzeCommandOptions): string {
  if (options.requirement !== undefined && options.requirementFile !== undefined) {
    throw new Error("Pass either --requirement or --requirement-file, not both.");
  }
  const text = options.requirementFile !== undefined
    ? fs.readFileSync(options.requirementFile, "utf-8")
    : options.requirement;
  if (text === undefined || text.trim() === "") {
    throw new Error("A feature description is required: pass --requirement <text> or --requirement-file <path>.");
  }
  return text;
}

const program = new Command();

program
  .name("featuremap")
  .description("Maps natural-language feature requirements to the functions that implement them in a ZIP archive of source code")
  .version("1.0.0");

program
  .command("analyze")
  .description("Analyze a source archive against a feature description")
  .argument("<archive>", "Path to the ZIP archive of source code")
  .option("-r, --requirement <text>", "Feature description to localize")
  .option("--requirement-file <path>", "Read the feature description from a file")
  .option("--output-dir <dir>", "Output directory for reports", ".")
  .option("--llm-provider <provider>", "Collaborator for plans and tests: 'api' (default, requires ANTHROPIC_API_KEY), 'cli' (uses local claude CLI) or 'none'", "api")
  .option("--verify", "Generate a verification test for the located features", false)
  .option("--top-k <n>", "Locations reported per requirement", parseNumber)
  .option("--min-score <n>", "Minimum normalized score for a location (0-1)", parseNumber)
  .option("--max-archive-mb <n>", "Maximum compressed archive size in MiB", parseNumber)
  .option("--max-file-kb <n>", "Maximum size of a single extracted file in KiB", parseNumber)
  .action(async (archivePath: string, options: AnalyzeCommandOptions) => {
    try {
      const provider = options.llmProvider;
      if (provider !== "api" && provider !== "cli" && provider !== "none") {
        throw new Error(`Invalid --llm-provider value: "${provider}". Must be "api", "cli" or "none".`);
      }
      const config = resolveConfig({
        topK: options.topK,
        minScore: options.minScore,
        maxArchiveBytes: options.maxArchiveMb === undefined ? undefined : Math.round(options.maxArchiveMb * MiB),
        maxFileBytes: options.maxFileKb === undefined ? undefined : Math.round(options.maxFileKb * 1024),
      });
      await scan({
        archivePath,
        requirementText: readRequirementText(options),
        outputDir: options.outputDir,
        llmProvider: provider,
        verify: options.verify,
        config,
      });
    } catch (error) {
      if (error instanceof AnalysisError) {
        console.error(chalk.red(`Error [${error.code}]:`), error.message);
      } else {
        console.error(chalk.red("Error:"), error instanceof Error ? error.message : error);
      }
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red("Error:"), error instanceof Error ? error.message : error);
  process.exit(1);
});
