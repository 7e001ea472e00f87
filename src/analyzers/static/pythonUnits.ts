import type { ExtractionAnomaly } from "../types";
import { splitLines } from "./units";
import type { DraftScan, UnitDraft } from "./units";

type PythonLine = {
  text: string;
  code: string; // string literals and comments blanked, columns preserved
  continuation: boolean; // starts inside brackets, a triple-quoted string, or after a trailing backslash
  indent: number;
  blank: boolean;
  commentOnly: boolean;
};

type ScannedLines = {
  lines: PythonLine[];
  unterminatedStringLine?: number;
};

type HeaderEnd = {
  line: number; // index of the line holding the closing colon
  column: number;
  inlineBody: boolean;
};

const HEADER_PATTERN = /^(\s*)(?:async\s+)?(def|class)\s+([A-Za-z_]\w*)/;
const TAB_WIDTH = 8;
const MAX_HEADER_LINES = 50;

/**
 * Finds `def`, `async def` and `class` blocks. A block ends on the last line
 * indented deeper than its header, ignoring blank lines; comment lines never
 * end a block.
 */
export function scanPythonDrafts(content: string): DraftScan {
  const { lines, unterminatedStringLine } = scanLines(splitLines(content));
  const drafts: UnitDraft[] = [];
  let anomaly: ExtractionAnomaly | undefined = unterminatedStringLine === undefined
    ? undefined
    : { line: unterminatedStringLine, reason: "unterminated triple-quoted string" };

  for (const [index, line] of lines.entries()) {
    if (anomaly && index + 1 >= anomaly.line) { break; }
    if (line.continuation) { continue; }

    const match = HEADER_PATTERN.exec(line.code);
    const keyword = match?.[2];
    const name = match?.[3];
    if (!match || !keyword || !name) { continue; }

    const header = findHeaderEnd(lines, index, match[0].length);
    if (!header) {
      anomaly = { line: index + 1, reason: "unterminated declaration header" };
      break;
    }

    const endIndex = findBlockEnd(lines, header, line.indent);
    if (endIndex === undefined) {
      anomaly = { line: index + 1, reason: "declaration without a body" };
      break;
    }

    drafts.push({
      shape: keyword === "class" ? "class" : "callable",
      name,
      signature: headerText(lines, index, header),
      startLine: index + 1,
      endLine: endIndex + 1,
      order: index,
    });
  }

  return anomaly ? { drafts, anomaly } : { drafts };
}

function scanLines(rawLines: string[]): ScannedLines {
  const lines: PythonLine[] = [];
  let triple: string | undefined;
  let tripleStartLine = 0;
  let depth = 0;
  let backslash = false;

  for (const [index, text] of rawLines.entries()) {
    const continuation = triple !== undefined || depth > 0 || backslash;
    let code = "";
    let hasComment = false;
    let i = 0;

    while (i < text.length) {
      if (triple !== undefined) {
        const close = text.indexOf(triple, i);
        const stop = close < 0 ? text.length : close + 3;
        code += " ".repeat(stop - i);
        i = stop;
        if (close >= 0) { triple = undefined; }
        continue;
      }

      const ch = text.charAt(i);
      if (ch === "#") {
        hasComment = true;
        code += " ".repeat(text.length - i);
        break;
      }
      if (ch === "\"" || ch === "'") {
        const delimiter = ch.repeat(3);
        if (text.startsWith(delimiter, i)) {
          triple = delimiter;
          tripleStartLine = index + 1;
          code += "   ";
          i += 3;
          continue;
        }
        let j = i + 1;
        while (j < text.length && text.charAt(j) !== ch) {
          j += text.charAt(j) === "\\" ? 2 : 1;
        }
        const stop = Math.min(j + 1, text.length);
        code += " ".repeat(stop - i);
        i = stop;
        continue;
      }

      if (ch === "(" || ch === "[" || ch === "{") {
        depth++;
      } else if (ch === ")" || ch === "]" || ch === "}") {
        depth = Math.max(0, depth - 1);
      }
      code += ch;
      i++;
    }

    backslash = triple === undefined && !hasComment && /\\\s*$/.test(text);
    const trimmed = text.trim();
    lines.push({
      text,
      code,
      continuation,
      indent: measureIndent(text),
      blank: trimmed === "",
      commentOnly: !continuation && trimmed.startsWith("#"),
    });
  }

  return triple === undefined ? { lines } : { lines, unterminatedStringLine: tripleStartLine };
}

function findHeaderEnd(lines: PythonLine[], start: number, column: number): HeaderEnd | undefined {
  let depth = 0;
  for (let index = start; index < lines.length && index < start + MAX_HEADER_LINES; index++) {
    const code = lines[index]?.code ?? "";
    for (let col = index === start ? column : 0; col < code.length; col++) {
      const ch = code.charAt(col);
      if (ch === "(" || ch === "[" || ch === "{") {
        depth++;
      } else if (ch === ")" || ch === "]" || ch === "}") {
        depth--;
      } else if (ch === ":" && depth === 0) {
        return { line: index, column: col, inlineBody: code.slice(col + 1).trim() !== "" };
      }
    }
    if (!lines[index + 1]?.continuation) { return undefined; }
  }
  return undefined;
}

function findBlockEnd(lines: PythonLine[], header: HeaderEnd, indent: number): number | undefined {
  let last = header.line;
  let hasBody = header.inlineBody;

  for (let index = header.line + 1; index < lines.length; index++) {
    const line = lines[index];
    if (!line) { break; }
    if (line.continuation) {
      last = index;
      continue;
    }
    if (line.blank) { continue; }
    if (line.commentOnly) {
      if (line.indent > indent) { last = index; }
      continue;
    }
    if (line.indent <= indent) { break; }
    last = index;
    hasBody = true;
  }

  return hasBody ? last : undefined;
}

function headerText(lines: PythonLine[], start: number, header: HeaderEnd): string {
  const parts: string[] = [];
  for (let index = start; index <= header.line; index++) {
    const text = lines[index]?.text ?? "";
    parts.push(index === header.line ? text.slice(0, header.column) : text);
  }
  return parts.join(" ");
}

function measureIndent(text: string): number {
  let width = 0;
  for (const ch of text) {
    if (ch === " ") {
      width++;
    } else if (ch === "\t") {
      width += TAB_WIDTH - (width % TAB_WIDTH);
    } else {
      break;
    }
  }
  return width;
}
