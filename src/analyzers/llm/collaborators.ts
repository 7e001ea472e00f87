import type { ExecutionResult, Language, LocalizationEvidence, Requirement } from "../types";

/** Everything a collaborator may look at: localized evidence, never the workspace itself. */
export type EvidenceDigest = {
  requirements: Requirement[];
  evidence: LocalizationEvidence[];
  languages: Language[];
  manifests: string[];
};

export interface Summarizer {
  summarize(digest: EvidenceDigest): Promise<string>;
}

export interface TestGenerator {
  generateTest(digest: EvidenceDigest): Promise<string>;
}

export interface TestRunner {
  run(code: string, digest: EvidenceDigest): Promise<ExecutionResult>;
}

export type FallbackResult<T> = {
  value: T;
  failure?: string;
};

export const UNAVAILABLE_MARKER = "[unavailable]";

export function unavailable(what: string, reason: string): string {
  return `${UNAVAILABLE_MARKER} ${what} could not be produced: ${reason}`;
}

/**
 * Runs a collaborator call and substitutes a fallback value when it rejects
 * or returns an empty string, so one flaky collaborator never fails a report.
 */
export async function withFallback<T>(
  call: () => Promise<T>,
  fallback: (reason: string) => T
): Promise<FallbackResult<T>> {
  try {
    const value = await call();
    if (typeof value === "string" && value.trim() === "") {
      return { value: fallback("empty response"), failure: "empty response" };
    }
    return { value };
  } catch (error) {
    const reason = error instanceof Error ? error.message : "unknown error";
    return { value: fallback(reason), failure: reason };
  }
}
