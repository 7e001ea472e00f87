export type Language = "python" | "javascript" | "typescript" | "tsx" | "jsx" | "java" | "cpp" | "csharp";

export type SourceEncoding = "utf-8" | "utf-8-lossy" | "utf-16le" | "utf-16be";

export type SourceFile = {
  path: string; // relative to the workspace root, POSIX separators
  language: Language;
  content: string;
  lineCount: number;
  encoding: SourceEncoding;
};

export type UnitKind = "function" | "method" | "class";

export type UnitRef = {
  filePath: string;
  name: string;
};

export type CodeUnit = {
  filePath: string;
  kind: UnitKind;
  name: string;
  signature: string;
  startLine: number; // 1-based, inclusive
  endLine: number; // 1-based, inclusive
  enclosingUnit?: UnitRef;
  bodyExcerpt: string;
};

export type ExtractionAnomaly = {
  line: number;
  reason: string;
};

export type ExtractionResult = {
  filePath: string;
  units: CodeUnit[];
  partiallyExtracted: boolean;
  anomaly?: ExtractionAnomaly;
};

export type Requirement = {
  ordinal: number; // 1-based
  text: string;
};

export type LocalizationEvidence = {
  requirementOrdinal: number;
  unit: CodeUnit;
  score: number; // 0-1, normalized per requirement
  matchedTerms: string[];
};

// Canonical report shape. Keys are snake_case because this is the wire format.
export type ImplementationLocation = {
  file: string;
  function: string;
  lines: string; // "start-end"
};

export type FeatureReportEntry = {
  feature_description: string;
  implementation_location: ImplementationLocation[];
};

export type ExecutionResult = {
  tests_passed: boolean;
  log: string;
};

export type FunctionalVerification = {
  generated_test_code: string;
  execution_result: ExecutionResult;
};

export type Report = {
  feature_analysis: FeatureReportEntry[];
  execution_plan_suggestion: string;
  functional_verification?: FunctionalVerification;
};

export type TruncatedEntry = {
  path: string;
  size: number;
  limit: number;
};

export type AnalysisDiagnostics = {
  totalFiles: number;
  totalLines: number;
  totalUnits: number;
  requirementCount: number;
  unreadableFiles: string[];
  partiallyExtractedFiles: { path: string; line: number; reason: string }[];
  truncatedEntries: TruncatedEntry[];
  skippedLinks: string[];
  manifests: string[];
  durationMs: number;
};
