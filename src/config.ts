import { z } from "zod";
import type { Language } from "./analyzers/types";
import { InvalidConfigError } from "./errors";

export const supportedExtensions: Record<string, Language> = {
  ".py": "python",
  ".js": "javascript",
  ".mjs": "javascript",
  ".cjs": "javascript",
  ".ts": "typescript",
  ".mts": "typescript",
  ".cts": "typescript",
  ".tsx": "tsx",
  ".jsx": "jsx",
  ".java": "java",
  ".cpp": "cpp",
  ".cc": "cpp",
  ".cxx": "cpp",
  ".hpp": "cpp",
  ".hh": "cpp",
  ".h": "cpp",
  ".cs": "csharp",
};

// Files that reveal how a project is built and run
export const manifestFileNames = new Set([
  "package.json",
  "requirements.txt",
  "setup.py",
  "pyproject.toml",
  "Pipfile",
  "pom.xml",
  "build.gradle",
  "build.gradle.kts",
  "CMakeLists.txt",
  "Makefile",
]);

export const manifestExtensions = new Set([".csproj", ".sln"]);

const MiB = 1024 * 1024;

const weightsSchema = z.object({
  overlap: z.number().nonnegative(),
  name: z.number().nonnegative(),
  noun: z.number().nonnegative(),
});

export const analyzerConfigSchema = z
  .object({
    maxArchiveBytes: z.number().int().positive(),
    maxUncompressedBytes: z.number().int().positive(),
    maxFileBytes: z.number().int().positive(),
    maxEntries: z.number().int().positive(),
    minScore: z.number().min(0).max(1),
    minRawScore: z.number().min(0).max(1),
    topK: z.number().int().positive().max(50),
    excerptChars: z.number().int().positive(),
    weights: weightsSchema.refine((w) => w.overlap + w.name + w.noun > 0, {
      message: "at least one weight must be positive",
    }),
    ignoredDirectories: z.array(z.string().min(1)),
  })
  .strict();

export type AnalyzerConfig = z.infer<typeof analyzerConfigSchema>;
export type ScoreWeights = z.infer<typeof weightsSchema>;

export const defaultConfig: AnalyzerConfig = {
  maxArchiveBytes: 50 * MiB,
  maxUncompressedBytes: 200 * MiB,
  maxFileBytes: 1 * MiB,
  maxEntries: 20_000,
  minScore: 0.5,
  minRawScore: 0.2,
  topK: 3,
  excerptChars: 2000,
  weights: { overlap: 0.5, name: 0.3, noun: 0.2 },
  ignoredDirectories: ["node_modules", ".git", "__MACOSX"],
};

export type ConfigOverrides = Partial<Omit<AnalyzerConfig, "weights">> & {
  weights?: Partial<ScoreWeights>;
};

export function resolveConfig(overrides: ConfigOverrides = {}): AnalyzerConfig {
  // Unset CLI flags arrive as undefined and must not shadow the defaults
  const merged: Record<string, unknown> = { ...defaultConfig };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined && key !== "weights") { merged[key] = value; }
  }
  const weights: Record<string, unknown> = { ...defaultConfig.weights };
  for (const [key, value] of Object.entries(overrides.weights ?? {})) {
    if (value !== undefined) { weights[key] = value; }
  }
  merged.weights = weights;
  const parsed = analyzerConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new InvalidConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
    );
  }
  if (parsed.data.maxFileBytes > parsed.data.maxUncompressedBytes) {
    throw new InvalidConfigError(["maxFileBytes: must not exceed maxUncompressedBytes"]);
  }
  return parsed.data;
}

export function languageForPath(filePath: string): Language | undefined {
  const dot = filePath.lastIndexOf(".");
  if (dot <= filePath.lastIndexOf("/")) { return undefined; }
  return supportedExtensions[filePath.slice(dot).toLowerCase()];
}
