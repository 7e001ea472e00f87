import type { LocalizationEvidence } from "../types";
import { toLocation } from "../location";

export type SampledUnit = {
  file: string;
  name: string;
  lines: string;
  excerpt: string;
  reason: string;
};

/**
 * Picks the code worth showing a language model. Requirements take turns so
 * each one gets its best match in before any gets a second, and a unit that
 * matches several requirements is shown once.
 */
export function sampleEvidence(evidence: readonly LocalizationEvidence[], maxUnits: number = 12): SampledUnit[] {
  const byRequirement = new Map<number, LocalizationEvidence[]>();
  for (const item of evidence) {
    const list = byRequirement.get(item.requirementOrdinal);
    if (list) {
      list.push(item);
    } else {
      byRequirement.set(item.requirementOrdinal, [item]);
    }
  }

  const queues = [...byRequirement.entries()]
    .sort(([a], [b]) => a - b)
    .map(([ordinal, items]) => ({ ordinal, items: [...items].sort((a, b) => b.score - a.score) }));

  const sampled: SampledUnit[] = [];
  const seen = new Set<string>();
  for (let rank = 0; sampled.length < maxUnits && queues.some((queue) => rank < queue.items.length); rank++) {
    for (const queue of queues) {
      const item = queue.items[rank];
      if (!item || sampled.length >= maxUnits) { continue; }
      const location = toLocation(item.unit);
      const key = `${location.file}:${location.lines}:${location.function}`;
      if (seen.has(key)) { continue; }
      seen.add(key);
      sampled.push({
        file: location.file,
        name: location.function,
        lines: location.lines,
        excerpt: item.unit.bodyExcerpt,
        reason: rank === 0
          ? `best match for requirement ${queue.ordinal}`
          : `match #${rank + 1} for requirement ${queue.ordinal}`,
      });
    }
  }
  return sampled;
}

export function truncateContent(content: string, maxChars: number): string {
  if (content.length <= maxChars) { return content; }
  return content.substring(0, maxChars) + "\n... (truncated)";
}
