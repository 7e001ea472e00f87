import type { ExtractionAnomaly } from "../types";
import { blankLiterals, lineAt, lineStarts, matchBraces } from "./braceLexer";
import type { BraceDialect } from "./braceLexer";
import type { DraftScan, UnitDraft } from "./units";

type HeaderContext = {
  inClassBody: boolean; // innermost open brace is a class body
  inCallable: boolean; // some enclosing brace is a function or method body
};

type ArrowMode = "none" | "after-assignment" | "member";

type Header = {
  shape: UnitDraft["shape"];
  name: string;
  nameEnd: number; // column just past the name, where body search starts
  arrows: ArrowMode;
  qualified?: boolean;
};

type Body =
  | { kind: "block"; open: number }
  | { kind: "expression"; start: number };

type ScanState = {
  content: string;
  code: string;
  starts: number[];
  closeOf: Map<number, number>;
  owners: Map<number, UnitDraft>;
  dialect: BraceDialect;
};

type HeaderRecognizer = (line: string, context: HeaderContext) => Header | undefined;

const MAX_HEADER_CHARS = 4000;

const NON_NAMES = new Set([
  "if", "for", "while", "switch", "catch", "with", "return", "function", "do", "else", "try",
  "new", "typeof", "await", "yield", "super", "import", "export", "throw", "case", "delete",
  "void", "in", "of", "sizeof", "foreach", "using", "lock", "fixed", "checked", "unchecked",
  "synchronized", "static_assert", "decltype", "alignof", "defined", "assert", "when", "where",
]);

// Words that start a statement, so `return foo(` or `new Foo(` is never a method header
const STATEMENT_WORDS = new Set(["return", "new", "throw", "else", "case", "await", "yield", "typeof", "delete", "goto"]);

const JS_FUNCTION = /^\s*(?:export\s+)?(?:default\s+)?(?:declare\s+)?(?:async\s+)?function\s*\*?\s*([A-Za-z_$][\w$]*)/d;
const JS_CLASS = /^\s*(?:export\s+)?(?:default\s+)?(?:declare\s+)?(?:abstract\s+)?class\s+([A-Za-z_$][\w$]*)/d;
const JS_BOUND_FUNCTION = /^\s*(?:export\s+)?(?:const|let|var)\s+([A-Za-z_$][\w$]*)\s*(?::[^=]*)?=\s*(?:async\s+)?(?:function\b|(?:\([^)]*\)|[A-Za-z_$][\w$]*)\s*(?::[^=]*?)?=>)/d;
const JS_METHOD = /^\s*(?:(?:public|private|protected|static|readonly|async|override|abstract|get|set|accessor)\s+)*\*?\s*(#?[A-Za-z_$][\w$]*)\s*(?:<[^>]*>)?\s*\(/d;
const JS_ARROW_PROPERTY = /^\s*(?:(?:public|private|protected|static|readonly|override)\s+)*(#?[A-Za-z_$][\w$]*)\s*(?::[^=]*)?=\s*(?:async\s+)?(?:\([^)]*\)|[A-Za-z_$][\w$]*)\s*(?::[^=]*?)?=>/d;

const TYPE_DECLARATION = /^\s*(?:@\w+(?:\([^)]*\))?\s+)*(?:\[[^\]]*\]\s*)*(?:(?:public|private|protected|internal|static|final|abstract|sealed|non-sealed|strictfp|partial|readonly|unsafe|new|file)\s+)*(?:class|interface|enum|record|struct)\s+([A-Za-z_]\w*)/d;
const MEMBER_METHOD = /^\s*(?:@\w+(?:\([^)]*\))?\s+)*(?:\[[^\]]*\]\s*)*(?:(?:public|private|protected|internal|static|final|abstract|synchronized|native|virtual|override|async|sealed|extern|unsafe|new|default|strictfp|partial|readonly)\s+)*(?:<[^>]+>\s+)?(?:([\w.$]+(?:<[^()]*>)?(?:\[\s*\])*\??)\s+)?([A-Za-z_]\w*)\s*(?:<[^>()]*>)?\s*\(/d;

const CPP_CLASS = /^\s*(?:template\s*<.*>\s*)?(?:class|struct|union)\s+(?:[A-Z_][A-Z0-9_]*\s+)?([A-Za-z_]\w*)/d;
const CPP_NAME_BEFORE_PAREN = /(~?(?:[A-Za-z_]\w*\s*::\s*)*~?[A-Za-z_]\w*|operator\s*[^\w\s(]+)\s*$/;
const CPP_DECLARATION_PREFIX = /^[\w\s:<>,*&~]*$/;

function fromMatch(match: RegExpExecArray | null, group: number, shape: Header["shape"], arrows: ArrowMode): Header | undefined {
  const name = match?.[group];
  const span = match?.indices?.[group];
  if (!name || !span || NON_NAMES.has(name)) { return undefined; }
  return { shape, name, nameEnd: span[1], arrows };
}

const recognizeEcmaScript: HeaderRecognizer = (line, context) =>
  fromMatch(JS_CLASS.exec(line), 1, "class", "none") ??
  fromMatch(JS_FUNCTION.exec(line), 1, "callable", "none") ??
  fromMatch(JS_BOUND_FUNCTION.exec(line), 1, "callable", "after-assignment") ??
  (context.inClassBody
    ? fromMatch(JS_ARROW_PROPERTY.exec(line), 1, "callable", "after-assignment") ??
      fromMatch(JS_METHOD.exec(line), 1, "callable", "none")
    : undefined);

function recognizeMember(arrows: ArrowMode): HeaderRecognizer {
  return (line, context) => {
    const type = fromMatch(TYPE_DECLARATION.exec(line), 1, "class", "none");
    if (type || !context.inClassBody) { return type; }
    const match = MEMBER_METHOD.exec(line);
    const returnType = match?.[1];
    if (returnType && STATEMENT_WORDS.has(returnType)) { return undefined; }
    return fromMatch(match, 2, "callable", arrows);
  };
}

const recognizeCpp: HeaderRecognizer = (line, context) => {
  const type = fromMatch(CPP_CLASS.exec(line), 1, "class", "none");
  if (type || context.inCallable) { return type; }

  const paren = line.indexOf("(");
  if (paren < 0) { return undefined; }
  const before = line.slice(0, paren);
  const match = CPP_NAME_BEFORE_PAREN.exec(before);
  const rawName = match?.[1];
  if (!match || !rawName) { return undefined; }

  const prefix = before.slice(0, match.index);
  const name = rawName.replace(/\s+/g, "");
  if (!CPP_DECLARATION_PREFIX.test(prefix) || NON_NAMES.has(name)) { return undefined; }
  // A bare call such as MACRO(x) has no return type; constructors and Foo::bar are the exceptions
  const qualified = name.includes("::");
  if (prefix.trim() === "" && !qualified && !context.inClassBody) { return undefined; }
  return { shape: "callable", name, nameEnd: paren, arrows: "none", qualified };
};

const recognizers: Record<BraceDialect, HeaderRecognizer> = {
  ecmascript: recognizeEcmaScript,
  java: recognizeMember("none"),
  csharp: recognizeMember("member"),
  cpp: recognizeCpp,
};

/**
 * Finds declarations in brace-delimited source. Each header must be
 * followed by a body: a `{ ... }` block, or for arrow forms an expression.
 * Headers ending in `;` (prototypes, abstract members) are not units.
 */
export function scanBraceDrafts(content: string, dialect: BraceDialect): DraftScan {
  const code = blankLiterals(content, dialect);
  const starts = lineStarts(code);
  const braces = matchBraces(code);
  const recognize = recognizers[dialect];

  const drafts: UnitDraft[] = [];
  const owners = new Map<number, UnitDraft>();
  const stack: number[] = [];
  let resumeAt = 0;

  for (const [index, lineStart] of starts.entries()) {
    const lineEnd = starts[index + 1] ?? code.length;
    const line = code.slice(lineStart, lineEnd).replace(/\r?\n$/, "");

    if (lineStart >= resumeAt) {
      const header = recognize(line, describeContext(stack, owners));
      const draft = header
        ? buildDraft({ content, code, starts, closeOf: braces.closeOf, owners, dialect }, lineStart, line, header)
        : undefined;
      if (draft) {
        drafts.push(draft.unit);
        resumeAt = draft.resumeAt;
      }
    }

    for (let i = lineStart; i < lineEnd; i++) {
      const ch = code.charAt(i);
      if (ch === "{") {
        stack.push(i);
      } else if (ch === "}") {
        stack.pop();
      }
    }
  }

  const anomaly = braceAnomaly(starts, braces.firstStrayClose, braces.firstUnclosedOpen);
  return anomaly ? { drafts, anomaly } : { drafts };
}

function describeContext(stack: number[], owners: Map<number, UnitDraft>): HeaderContext {
  const innermost = stack[stack.length - 1];
  const innermostOwner = innermost === undefined ? undefined : owners.get(innermost);
  return {
    inClassBody: innermostOwner?.shape === "class",
    inCallable: stack.some((open) => owners.get(open)?.shape === "callable"),
  };
}

function buildDraft(
  scan: ScanState,
  lineStart: number,
  line: string,
  header: Header
): { unit: UnitDraft; resumeAt: number } | undefined {
  const { content, code, starts, closeOf, owners } = scan;
  const body = findBody(code, lineStart + header.nameEnd, header, scan.dialect === "cpp");
  if (!body) { return undefined; }

  const headerStart = lineStart + (line.length - line.trimStart().length);
  const startLine = lineAt(starts, lineStart);

  if (body.kind === "block") {
    const close = closeOf.get(body.open);
    if (close === undefined || owners.has(body.open)) { return undefined; }
    const unit: UnitDraft = {
      shape: header.shape,
      name: header.name,
      signature: stripArrow(content.slice(headerStart, body.open)),
      startLine,
      endLine: lineAt(starts, close),
      order: lineStart,
      ...(header.qualified ? { qualified: true } : {}),
    };
    owners.set(body.open, unit);
    return { unit, resumeAt: body.open };
  }

  const end = findExpressionEnd(code, body.start);
  const unit: UnitDraft = {
    shape: header.shape,
    name: header.name,
    signature: stripArrow(content.slice(headerStart, body.start)),
    startLine,
    endLine: Math.max(startLine, lineAt(starts, end)),
    order: lineStart,
  };
  return { unit, resumeAt: end };
}

function findBody(code: string, from: number, header: Header, initializerLists: boolean): Body | undefined {
  let depth = 0;
  let assigned = false;
  let inInitializerList = false;
  const limit = Math.min(code.length, from + MAX_HEADER_CHARS);

  for (let i = from; i < limit; i++) {
    const ch = code.charAt(i);
    // Braces nested in parameters, or C++ member initializers such as value_{0}, do not open the body
    const bracedInitializer = ch === "{" && inInitializerList && /[\w>]\s*$/.test(code.slice(Math.max(from, i - 40), i));
    if (ch === "(" || ch === "[" || (ch === "{" && (depth > 0 || bracedInitializer))) {
      depth++;
      continue;
    }
    if (ch === ")" || ch === "]" || (ch === "}" && depth > 0)) {
      depth--;
      if (depth < 0) { return undefined; }
      continue;
    }
    if (depth > 0) { continue; }

    if (ch === "{") { return { kind: "block", open: i }; }
    if (ch === ";" || ch === "}") { return undefined; }
    if (initializerLists && ch === ":" && code.charAt(i + 1) !== ":" && code.charAt(i - 1) !== ":") {
      inInitializerList = true;
      continue;
    }
    if (ch === "=" && code.charAt(i + 1) === ">") {
      if (header.arrows === "member" || (header.arrows === "after-assignment" && assigned)) {
        return arrowBody(code, i + 2);
      }
      i++;
      continue;
    }
    if (ch === "=" && code.charAt(i + 1) !== "=" && !"=!<>".includes(code.charAt(i - 1))) {
      // `struct Point p = {1, 2};` is a variable, not a declaration
      if (header.shape === "class") { return undefined; }
      assigned = true;
    }
  }
  return undefined;
}

function arrowBody(code: string, from: number): Body {
  let i = from;
  while (i < code.length && /\s/.test(code.charAt(i))) { i++; }
  return code.charAt(i) === "{" ? { kind: "block", open: i } : { kind: "expression", start: i };
}

// Offset of the last character of an arrow's expression body
function findExpressionEnd(code: string, start: number): number {
  let depth = 0;
  let sawCode = false;

  for (let i = start; i < code.length; i++) {
    const ch = code.charAt(i);
    if (ch === "(" || ch === "[" || ch === "{") {
      depth++;
    } else if (ch === ")" || ch === "]" || ch === "}") {
      if (depth === 0) { return Math.max(start, i - 1); }
      depth--;
    } else if (depth === 0 && (ch === ";" || ch === ",")) {
      return i;
    } else if (depth === 0 && ch === "\n" && sawCode) {
      return i - 1;
    }
    if (!/\s/.test(ch)) { sawCode = true; }
  }
  return Math.max(start, code.length - 1);
}

function stripArrow(signature: string): string {
  return signature.replace(/\s*=>\s*$/, "");
}

function braceAnomaly(starts: number[], strayClose?: number, unclosedOpen?: number): ExtractionAnomaly | undefined {
  const stray = strayClose === undefined ? undefined : lineAt(starts, strayClose);
  const unclosed = unclosedOpen === undefined ? undefined : lineAt(starts, unclosedOpen);
  if (stray !== undefined && (unclosed === undefined || stray <= unclosed)) {
    return { line: stray, reason: "unmatched closing brace" };
  }
  if (unclosed !== undefined) {
    return { line: unclosed, reason: "unclosed brace" };
  }
  return undefined;
}
