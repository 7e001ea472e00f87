import type { CodeUnit, ExtractionAnomaly, ExtractionResult, SourceFile, UnitKind } from "../types";

/**
 * A declaration found by a language strategy, before nesting and kinds are
 * resolved. Strategies only decide where a declaration starts and ends.
 */
export type UnitDraft = {
  shape: "class" | "callable";
  name: string;
  signature: string;
  startLine: number;
  endLine: number;
  order: number; // offset of the header, breaks ties between units on one line
  qualified?: boolean; // out-of-line member definition such as Foo::bar
};

export type DraftScan = {
  drafts: UnitDraft[];
  anomaly?: ExtractionAnomaly;
};

export type FinalizeOptions = {
  excerptChars: number;
  commentPrefixes: string[];
};

const MAX_LEADING_COMMENT_LINES = 10;
const MAX_SIGNATURE_CHARS = 240;

export function finalizeUnits(file: SourceFile, scan: DraftScan, options: FinalizeOptions): ExtractionResult {
  const lines = splitLines(file.content);
  const ordered = [...scan.drafts].sort(
    (a, b) => a.startLine - b.startLine || b.endLine - a.endLine || a.order - b.order
  );

  const parents = new Map<UnitDraft, UnitDraft>();
  const open: UnitDraft[] = [];
  for (const draft of ordered) {
    let parent = open[open.length - 1];
    while (parent && !contains(parent, draft)) {
      open.pop();
      parent = open[open.length - 1];
    }
    if (parent) { parents.set(draft, parent); }
    open.push(draft);
  }

  // Only units bounded before the first anomaly are trustworthy
  const isKept = (draft: UnitDraft) => !scan.anomaly || draft.endLine < scan.anomaly.line;

  const units: CodeUnit[] = [];
  for (const draft of ordered) {
    if (!isKept(draft)) { continue; }
    const parent = parents.get(draft);
    const unit: CodeUnit = {
      filePath: file.path,
      kind: resolveKind(draft, parent),
      name: draft.name,
      signature: collapseWhitespace(draft.signature).slice(0, MAX_SIGNATURE_CHARS),
      startLine: draft.startLine,
      endLine: draft.endLine,
      bodyExcerpt: buildExcerpt(lines, draft, options),
    };
    if (parent && isKept(parent)) {
      unit.enclosingUnit = { filePath: file.path, name: parent.name };
    }
    units.push(unit);
  }

  return {
    filePath: file.path,
    units,
    partiallyExtracted: scan.anomaly !== undefined,
    ...(scan.anomaly ? { anomaly: scan.anomaly } : {}),
  };
}

export function splitLines(content: string): string[] {
  return content.split(/\r?\n/);
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function contains(outer: UnitDraft, inner: UnitDraft): boolean {
  return outer.startLine <= inner.startLine && inner.endLine <= outer.endLine;
}

function resolveKind(draft: UnitDraft, parent: UnitDraft | undefined): UnitKind {
  if (draft.shape === "class") { return "class"; }
  if (draft.qualified || parent?.shape === "class") { return "method"; }
  return "function";
}

function buildExcerpt(lines: string[], draft: UnitDraft, options: FinalizeOptions): string {
  const leading: string[] = [];
  for (let i = draft.startLine - 2; i >= 0 && leading.length < MAX_LEADING_COMMENT_LINES; i--) {
    const line = lines[i] ?? "";
    const trimmed = line.trim();
    if (!trimmed || !options.commentPrefixes.some((prefix) => trimmed.startsWith(prefix))) { break; }
    leading.unshift(line);
  }
  const text = [...leading, ...lines.slice(draft.startLine - 1, draft.endLine)].join("\n");
  return text.length > options.excerptChars ? text.slice(0, options.excerptChars) : text;
}
