import type { ExtractionResult, Language, SourceFile } from "../types";
import type { BraceDialect } from "./braceLexer";
import { scanBraceDrafts } from "./braceUnits";
import { scanPythonDrafts } from "./pythonUnits";
import { finalizeUnits } from "./units";
import type { DraftScan } from "./units";

export type ExtractionStrategy =
  | { kind: "indentation"; commentPrefixes: string[] }
  | { kind: "braces"; dialect: BraceDialect; commentPrefixes: string[] };

export type ExtractOptions = {
  excerptChars: number;
};

const C_STYLE_COMMENTS = ["//", "/*", "*"];

const ecmascript: ExtractionStrategy = { kind: "braces", dialect: "ecmascript", commentPrefixes: [...C_STYLE_COMMENTS, "@"] };

export const extractionStrategies: Record<Language, ExtractionStrategy> = {
  python: { kind: "indentation", commentPrefixes: ["#", "@"] },
  javascript: ecmascript,
  typescript: ecmascript,
  tsx: ecmascript,
  jsx: ecmascript,
  java: { kind: "braces", dialect: "java", commentPrefixes: [...C_STYLE_COMMENTS, "@"] },
  csharp: { kind: "braces", dialect: "csharp", commentPrefixes: [...C_STYLE_COMMENTS, "["] },
  cpp: { kind: "braces", dialect: "cpp", commentPrefixes: [...C_STYLE_COMMENTS, "template"] },
};

export function extractUnits(file: SourceFile, options: ExtractOptions): ExtractionResult {
  const strategy = extractionStrategies[file.language];
  return finalizeUnits(file, scanDrafts(file.content, strategy), {
    excerptChars: options.excerptChars,
    commentPrefixes: strategy.commentPrefixes,
  });
}

function scanDrafts(content: string, strategy: ExtractionStrategy): DraftScan {
  switch (strategy.kind) {
    case "indentation":
      return scanPythonDrafts(content);
    case "braces":
      return scanBraceDrafts(content, strategy.dialect);
  }
}

/**
 * Extracts every file independently. Results come back in input order no
 * matter which file finishes first, and a failure in one file is recorded on
 * that file's result instead of rejecting the batch.
 */
export async function extractAll(files: SourceFile[], options: ExtractOptions): Promise<ExtractionResult[]> {
  return Promise.all(files.map(async (file): Promise<ExtractionResult> => {
    try {
      return extractUnits(file, options);
    } catch (error) {
      return {
        filePath: file.path,
        units: [],
        partiallyExtracted: true,
        anomaly: { line: 1, reason: `extraction failed: ${error instanceof Error ? error.message : "unknown error"}` },
      };
    }
  }));
}
