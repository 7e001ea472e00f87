import Anthropic from "@anthropic-ai/sdk";
import { execFile } from "child_process";
import { z } from "zod";

import type { EvidenceDigest, Summarizer, TestGenerator } from "./collaborators";
import { detectProjectType } from "./heuristic";
import type { ProjectType } from "./heuristic";
import { sampleEvidence, truncateContent } from "./sampler";

export type LlmProvider = "api" | "cli";

/** Sends one prompt, resolves with the model's text answer. */
export type Completion = (prompt: string) => Promise<string>;

const MODEL = "claude-sonnet-4-5-20250929";
const MAX_EXCERPT_CHARS = 1500;

const SAFETY_SYSTEM_PROMPT = `SAFETY CONSTRAINTS - You MUST follow these rules:
- NEVER modify, create, or delete any files
- NEVER run any git commands
- NEVER use Bash or any shell commands
- You are ONLY reading the code excerpts in the prompt and answering in text`;

const cliOutputSchema = z.object({
  result: z.unknown(),
  is_error: z.boolean().optional(),
});

export function createApiCompletion(apiKey: string): Completion {
  const client = new Anthropic({ apiKey });
  return async (prompt) => {
    const response = await client.messages.create({
      model: MODEL,
      max_tokens: 4096,
      system: SAFETY_SYSTEM_PROMPT,
      messages: [{ role: "user", content: prompt }],
    });

    return response.content
      .filter((block): block is Anthropic.TextBlock => block.type === "text")
      .map((block) => block.text)
      .join("");
  };
}

export function createCliCompletion(): Completion {
  return runClaude;
}

export class LlmSummarizer implements Summarizer {
  constructor(private readonly complete: Completion) {}

  async summarize(digest: EvidenceDigest): Promise<string> {
    const text = await this.complete(buildSummaryPrompt(digest));
    return text.trim();
  }
}

export class LlmTestGenerator implements TestGenerator {
  constructor(private readonly complete: Completion) {}

  async generateTest(digest: EvidenceDigest): Promise<string> {
    const text = await this.complete(buildTestPrompt(digest));
    return extractCode(text);
  }
}

function runClaude(prompt: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const args = [
      "-p",
      "--output-format", "json",
      "--model", MODEL,
      "--append-system-prompt", SAFETY_SYSTEM_PROMPT,
    ];

    const child = execFile("claude", args, {
      maxBuffer: 10 * 1024 * 1024, // 10MB
      timeout: 180_000, // 3 minutes
    }, (error, stdout, stderr) => {
      if (error) {
        reject(new Error(`claude CLI failed: ${error.message}${stderr ? `\nstderr: ${stderr}` : ""}`));
        return;
      }

      try {
        resolve(parseCliOutput(stdout));
      } catch (parseError) {
        reject(parseError);
      }
    });

    // Pipe prompt via stdin to avoid ARG_MAX limits
    if (child.stdin) {
      child.stdin.write(prompt);
      child.stdin.end();
    }
  });
}

/** Unwraps `--output-format json` output; plain text output is returned as is. */
export function parseCliOutput(stdout: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch {
    return stdout;
  }

  const outer = cliOutputSchema.safeParse(parsed);
  if (!outer.success) { return stdout; }
  const { result, is_error: isError } = outer.data;
  if (result === undefined) { return stdout; }
  const text = typeof result === "string" ? result : JSON.stringify(result);
  if (isError) {
    throw new Error(`claude CLI reported an error: ${text}`);
  }
  return text;
}

export function buildSummaryPrompt(digest: EvidenceDigest): string {
  return `You are helping a reviewer run and verify a software project. The reviewer gave a feature description, and each requirement below was matched to the code most likely to implement it.

${describeProject(digest)}

## Requirements

${formatRequirements(digest)}

## Located Code

${formatSampledCode(digest)}

Write a short execution plan in plain text: how to install dependencies, build and start the project, then how to exercise each requirement. Refer to the files and functions above by name. Do not invent files that are not listed.
Return ONLY the plan, no preamble.`;
}

export function buildTestPrompt(digest: EvidenceDigest): string {
  return `You are writing an automated test for a software project. Each requirement below was matched to the code most likely to implement it.

${describeProject(digest)}

## Requirements

${formatRequirements(digest)}

## Located Code

${formatSampledCode(digest)}

Write ONE test file, in the testing framework usual for this project type, with at least one test per requirement that exercises the located code.
Return ONLY the test file inside a single fenced code block.`;
}

/** Takes the first fenced block of a model answer, or the whole answer when it has none. */
export function extractCode(text: string): string {
  const fenced = /```[^\n`]*\n([\s\S]*?)```/.exec(text);
  const code = (fenced?.[1] ?? text).trim();
  return code ? `${code}\n` : "";
}

function describeProject(digest: EvidenceDigest): string {
  const projectType: ProjectType = detectProjectType(digest.languages, digest.manifests);
  return [
    `Project type: ${projectType}`,
    `Languages: ${digest.languages.join(", ") || "none detected"}`,
    `Manifests: ${digest.manifests.join(", ") || "none"}`,
  ].join("\n");
}

function formatRequirements(digest: EvidenceDigest): string {
  return digest.requirements.map((requirement) => `${requirement.ordinal}. ${requirement.text}`).join("\n");
}

function formatSampledCode(digest: EvidenceDigest): string {
  const sampled = sampleEvidence(digest.evidence);
  if (sampled.length === 0) { return "(no implementation was located)"; }
  return sampled
    .map((unit) => `--- ${unit.file} ${unit.name} (lines ${unit.lines}, ${unit.reason}) ---\n${truncateContent(unit.excerpt, MAX_EXCERPT_CHARS)}`)
    .join("\n\n");
}
