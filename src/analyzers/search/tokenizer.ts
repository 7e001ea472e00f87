import vocabulary from "../../data/vocabulary.json";

const STOP_WORDS = new Set(vocabulary.stopWords);
const ALIASES = new Map(Object.entries(vocabulary.aliases));

// Uppercase runs (HTTP in HTTPServer), capitalised or lowercase words, digit runs, other scripts
const WORD_PATTERN = /\p{Lu}+(?!\p{Ll})|\p{Lu}?\p{Ll}+|\p{N}+|\p{L}+/gu;
const DOUBLED_CONSONANT = /([bdfgkmnprt])\1$/;

/**
 * Splits text on separators and case boundaries into lowercase fragments,
 * before any filtering: `getHTTPServer_v2` gives get, http, server, v, 2.
 */
export function splitWords(text: string): string[] {
  const words: string[] = [];
  for (const chunk of text.split(/[^\p{L}\p{N}]+/u)) {
    for (const match of chunk.matchAll(WORD_PATTERN)) {
      words.push(match[0].toLowerCase());
    }
  }
  return words;
}

/** Maps one lowercase fragment to its index token, or undefined when it carries no meaning. */
export function normalizeToken(word: string): string | undefined {
  if (word.length < 2 || /^\p{N}+$/u.test(word) || STOP_WORDS.has(word)) { return undefined; }
  const alias = ALIASES.get(word);
  if (alias !== undefined) { return alias; }
  const stemmed = stem(word);
  if (stemmed.length < 2 || STOP_WORDS.has(stemmed)) { return undefined; }
  return stemmed;
}

export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  for (const word of splitWords(text)) {
    const token = normalizeToken(word);
    if (token !== undefined) { tokens.push(token); }
  }
  return tokens;
}

export function uniqueTokens(text: string): string[] {
  return [...new Set(tokenize(text))].sort();
}

// Plural, -ing and -ed suffixes, then a trailing e, so parse/parses/parsed/parsing agree.
export function stem(word: string): string {
  if (word.length <= 3) { return word; }
  let result = word;

  if (result.endsWith("ies") && result.length > 4) {
    result = result.slice(0, -3) + "y";
  } else if (result.endsWith("sses")) {
    result = result.slice(0, -2);
  } else if (result.endsWith("s") && !/(ss|us|is)$/.test(result)) {
    result = result.slice(0, -1);
  }

  if (result.endsWith("ing") && result.length > 5) {
    result = undouble(result.slice(0, -3));
  } else if (result.endsWith("ed") && result.length > 4) {
    result = undouble(result.slice(0, -2));
  }

  if (result.endsWith("e") && result.length > 3) {
    result = result.slice(0, -1);
  }
  return result;
}

function undouble(word: string): string {
  return DOUBLED_CONSONANT.test(word) ? word.slice(0, -1) : word;
}

export function isActionVerb(token: string): boolean {
  return ACTION_VERBS.has(token);
}

const ACTION_VERBS = new Set(
  vocabulary.actionVerbs.flatMap((verb) => {
    const token = normalizeToken(verb);
    return token === undefined ? [] : [token];
  })
);
