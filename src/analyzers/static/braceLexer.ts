export type BraceDialect = "ecmascript" | "java" | "csharp" | "cpp";

export type BraceMatch = {
  closeOf: Map<number, number>; // opening brace offset -> closing brace offset
  firstStrayClose?: number;
  firstUnclosedOpen?: number;
};

/**
 * Replaces comments and string/char literals with spaces, keeping every
 * newline and offset intact so positions map back to the original text.
 *
 * Best effort only: template literal substitutions, raw and verbatim strings
 * and regular expression literals are not modelled.
 */
export function blankLiterals(content: string, dialect: BraceDialect): string {
  const out: string[] = [];
  let i = 0;

  const blankUntil = (end: number) => {
    for (; i < end; i++) {
      const ch = content.charAt(i);
      out.push(ch === "\n" || ch === "\r" ? ch : " ");
    }
  };

  while (i < content.length) {
    const ch = content.charAt(i);
    const next = content.charAt(i + 1);

    if (ch === "/" && next === "/") {
      const newline = content.indexOf("\n", i);
      blankUntil(newline < 0 ? content.length : newline);
    } else if (ch === "/" && next === "*") {
      const close = content.indexOf("*/", i + 2);
      blankUntil(close < 0 ? content.length : close + 2);
    } else if (ch === "'" && dialect === "ecmascript" && isApostrophe(content, i)) {
      out.push(ch);
      i++;
    } else if (ch === "\"" || ch === "'") {
      blankUntil(endOfQuoted(content, i, ch, false));
    } else if (ch === "`" && dialect === "ecmascript") {
      blankUntil(endOfQuoted(content, i, ch, true));
    } else {
      out.push(ch);
      i++;
    }
  }

  return out.join("");
}

const LETTER = /^\p{L}$/u;

// JSX text such as <p>Don't</p>: a quote between two letters never opens a string literal
function isApostrophe(content: string, offset: number): boolean {
  return LETTER.test(content.charAt(offset - 1)) && LETTER.test(content.charAt(offset + 1));
}

// Offset just past the closing delimiter. Single-line literals also stop at a line break.
function endOfQuoted(content: string, start: number, delimiter: string, multiline: boolean): number {
  let i = start + 1;
  while (i < content.length) {
    const ch = content.charAt(i);
    if (ch === "\\") {
      i += 2;
      continue;
    }
    if (ch === delimiter) { return i + 1; }
    if (ch === "\n" && !multiline) { return i; }
    i++;
  }
  return content.length;
}

export function matchBraces(code: string): BraceMatch {
  const closeOf = new Map<number, number>();
  const stack: number[] = [];
  let firstStrayClose: number | undefined;

  for (let i = 0; i < code.length; i++) {
    const ch = code.charAt(i);
    if (ch === "{") {
      stack.push(i);
    } else if (ch === "}") {
      const open = stack.pop();
      if (open === undefined) {
        firstStrayClose ??= i;
      } else {
        closeOf.set(open, i);
      }
    }
  }

  return {
    closeOf,
    ...(firstStrayClose === undefined ? {} : { firstStrayClose }),
    ...(stack.length > 0 ? { firstUnclosedOpen: stack[0] } : {}),
  };
}

export function lineStarts(content: string): number[] {
  const starts = [0];
  for (let i = 0; i < content.length; i++) {
    if (content.charAt(i) === "\n") { starts.push(i + 1); }
  }
  return starts;
}

// 1-based line containing the offset
export function lineAt(starts: number[], offset: number): number {
  let low = 0;
  let high = starts.length - 1;
  while (low < high) {
    const mid = (low + high + 1) >> 1;
    if ((starts[mid] ?? 0) <= offset) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return low + 1;
}
