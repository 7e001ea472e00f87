import type { CodeUnit } from "../types";
import { tokenize, uniqueTokens } from "./tokenizer";

type IndexedUnit = {
  unit: CodeUnit;
  frequencies: Map<string, number>;
  nameTokens: Set<string>;
};

export type QueryMatch = {
  unit: CodeUnit;
  sharedTokens: string[];
  overlap: number;
  nameMatches: number;
};

/**
 * Inverted token index over the code units of one analysis. Units are
 * numbered in a fixed order so that postings, and every query result built
 * from them, do not depend on the order units were handed in.
 */
export class LocalizationIndex {
  private constructor(
    private readonly entries: IndexedUnit[],
    private readonly postings: Map<string, number[]>,
    private readonly ids: Map<CodeUnit, number>
  ) {}

  static build(units: readonly CodeUnit[]): LocalizationIndex {
    const ordered = [...units].sort(compareUnits);
    const entries: IndexedUnit[] = [];
    const postings = new Map<string, number[]>();
    const ids = new Map<CodeUnit, number>();

    for (const [id, unit] of ordered.entries()) {
      ids.set(unit, id);
      const frequencies = new Map<string, number>();
      for (const token of tokenize(`${unit.name} ${unit.signature} ${unit.bodyExcerpt}`)) {
        frequencies.set(token, (frequencies.get(token) ?? 0) + 1);
      }
      for (const token of frequencies.keys()) {
        const ids = postings.get(token);
        if (ids) {
          ids.push(id);
        } else {
          postings.set(token, [id]);
        }
      }
      entries.push({
        unit,
        frequencies,
        nameTokens: new Set(tokenize(unit.name)),
      });
    }

    return new LocalizationIndex(entries, postings, ids);
  }

  get size(): number {
    return this.entries.length;
  }

  /** How often a token occurs in the indexed text of a unit, 0 when the unit is not indexed. */
  frequency(unit: CodeUnit, token: string): number {
    const id = this.ids.get(unit);
    if (id === undefined) { return 0; }
    return this.entries[id]?.frequencies.get(token) ?? 0;
  }

  query(text: string): QueryMatch[] {
    return this.queryTokens(uniqueTokens(text));
  }

  queryTokens(tokens: readonly string[]): QueryMatch[] {
    const shared = new Map<number, string[]>();
    for (const token of new Set(tokens)) {
      for (const id of this.postings.get(token) ?? []) {
        const list = shared.get(id);
        if (list) {
          list.push(token);
        } else {
          shared.set(id, [token]);
        }
      }
    }

    const matches: { id: number; match: QueryMatch }[] = [];
    for (const [id, sharedTokens] of shared) {
      const entry = this.entries[id];
      if (!entry) { continue; }
      sharedTokens.sort();
      matches.push({
        id,
        match: {
          unit: entry.unit,
          sharedTokens,
          overlap: sharedTokens.length,
          nameMatches: sharedTokens.filter((token) => entry.nameTokens.has(token)).length,
        },
      });
    }

    // Ids follow path then start line, so the last key settles those ties
    return matches
      .sort((a, b) =>
        b.match.overlap - a.match.overlap ||
        spanOf(a.match.unit) - spanOf(b.match.unit) ||
        a.id - b.id
      )
      .map(({ match }) => match);
  }
}

function spanOf(unit: CodeUnit): number {
  return unit.endLine - unit.startLine;
}

export function compareUnits(a: CodeUnit, b: CodeUnit): number {
  if (a.filePath !== b.filePath) { return a.filePath < b.filePath ? -1 : 1; }
  if (a.startLine !== b.startLine) { return a.startLine - b.startLine; }
  if (a.endLine !== b.endLine) { return b.endLine - a.endLine; }
  if (a.name !== b.name) { return a.name < b.name ? -1 : 1; }
  return 0;
}
