import type { LocalizationEvidence, Requirement } from "./analyzers/types";
import type { LocalizationIndex, QueryMatch } from "./analyzers/search/localizationIndex";
import { uniqueTokens } from "./analyzers/search/tokenizer";
import type { ScoreWeights } from "./config";
import { extractDomainNouns } from "./requirements";

export type LocalizeOptions = {
  weights: ScoreWeights;
  minScore: number;
  minRawScore: number;
};

type ScoredMatch = {
  match: QueryMatch;
  raw: number;
};

export function localize(
  requirements: readonly Requirement[],
  index: LocalizationIndex,
  options: LocalizeOptions
): LocalizationEvidence[] {
  const evidence: LocalizationEvidence[] = [];
  for (const requirement of [...requirements].sort((a, b) => a.ordinal - b.ordinal)) {
    evidence.push(...localizeRequirement(requirement, index, options));
  }
  return evidence;
}

/**
 * Scores every unit sharing a token with the requirement, then keeps the ones
 * close to the best candidate. A requirement with no confident match yields
 * no evidence at all.
 */
export function localizeRequirement(
  requirement: Requirement,
  index: LocalizationIndex,
  options: LocalizeOptions
): LocalizationEvidence[] {
  const queryTokens = uniqueTokens(requirement.text);
  if (queryTokens.length === 0) { return []; }
  const nouns = new Set(extractDomainNouns(requirement.text));

  const scored: ScoredMatch[] = index.queryTokens(queryTokens).map((match) => ({
    match,
    raw: rawScore(match, queryTokens.length, nouns, options.weights),
  }));

  const best = scored.reduce((max, candidate) => Math.max(max, candidate.raw), 0);
  if (best === 0) { return []; }

  return scored
    .map((candidate) => ({ ...candidate, normalized: candidate.raw / best }))
    .filter((candidate) => candidate.normalized >= options.minScore && candidate.raw >= options.minRawScore)
    // Stable sort: equal scores keep the index order
    .sort((a, b) => b.normalized - a.normalized)
    .map((candidate) => ({
      requirementOrdinal: requirement.ordinal,
      unit: candidate.match.unit,
      score: roundScore(candidate.normalized),
      matchedTerms: candidate.match.sharedTokens,
    }));
}

export function rawScore(
  match: QueryMatch,
  queryTokenCount: number,
  nouns: ReadonlySet<string>,
  weights: ScoreWeights
): number {
  const totalWeight = weights.overlap + weights.name + weights.noun;
  const sharedNouns = match.sharedTokens.filter((token) => nouns.has(token)).length;
  const weighted =
    weights.overlap * (match.overlap / queryTokenCount) +
    weights.name * (match.nameMatches / queryTokenCount) +
    weights.noun * (nouns.size > 0 ? sharedNouns / nouns.size : 0);
  return weighted / totalWeight;
}

export function roundScore(value: number): number {
  return Math.round(value * 10000) / 10000;
}
