import type { Requirement } from "./analyzers/types";
import { isActionVerb, uniqueTokens } from "./analyzers/search/tokenizer";

// Bullets, numbered and lettered items: "- ", "* ", "• ", "1. ", "2) ", "a) "
const LIST_MARKER = /^\s*(?:[-*•+]|\d+[.)]|[A-Za-z][)])\s+/u;
const SENTENCE_END = /[.!?](?=\s|$)|[;。；！？]/u;

/**
 * Breaks a feature description into requirement statements, one per sentence
 * or line, numbered from 1 in reading order.
 */
export function splitRequirements(description: string): Requirement[] {
  const statements: string[] = [];
  for (const line of description.split(/\r?\n/)) {
    for (const fragment of line.replace(LIST_MARKER, "").split(SENTENCE_END)) {
      const text = fragment.trim();
      if (/\p{L}/u.test(text)) { statements.push(text); }
    }
  }
  return statements.map((text, index) => ({ ordinal: index + 1, text }));
}

/**
 * Content tokens of a requirement that name things rather than actions.
 * A word-list heuristic: "parse configuration files" gives config and fil.
 */
export function extractDomainNouns(text: string): string[] {
  return uniqueTokens(text).filter((token) => !isActionVerb(token));
}
