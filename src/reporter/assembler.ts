import type {
  ExecutionResult,
  FeatureReportEntry,
  FunctionalVerification,
  Language,
  LocalizationEvidence,
  Report,
  Requirement,
} from "../analyzers/types";
import { toLocation } from "../analyzers/location";
import { unavailable, withFallback } from "../analyzers/llm/collaborators";
import type { EvidenceDigest, Summarizer, TestGenerator, TestRunner } from "../analyzers/llm/collaborators";

export type AssembleInput = {
  requirements: readonly Requirement[];
  evidence: readonly LocalizationEvidence[];
  executionPlan: string;
  verification?: FunctionalVerification;
  topK: number;
};

export type AssemblerCollaborators = {
  summarizer: Summarizer;
  testGenerator: TestGenerator;
  testRunner?: TestRunner;
};

export type AssemblerOptions = {
  topK: number;
  onProgress?: (message: string) => void;
};

export type BuildContext = {
  languages: Language[];
  manifests: string[];
  verify: boolean;
};

export const NOT_EXECUTED: ExecutionResult = {
  tests_passed: false,
  log: "Test execution was not performed.",
};

/**
 * Pure report assembly: the plan and verification texts are copied through
 * untouched, and the same input always yields the same report.
 */
export function assembleReport(input: AssembleInput): Report {
  const featureAnalysis: FeatureReportEntry[] = input.requirements.map((requirement) => ({
    feature_description: requirement.text,
    implementation_location: input.evidence
      .filter((item) => item.requirementOrdinal === requirement.ordinal)
      .sort((a, b) => b.score - a.score)
      .slice(0, input.topK)
      .map((item) => toLocation(item.unit)),
  }));

  const report: Report = {
    feature_analysis: featureAnalysis,
    execution_plan_suggestion: input.executionPlan,
  };
  if (input.verification) {
    report.functional_verification = {
      generated_test_code: input.verification.generated_test_code,
      execution_result: { ...input.verification.execution_result },
    };
  }
  return report;
}

/** Collects the collaborator texts for a report, then assembles it. */
export class ReportAssembler {
  constructor(
    private readonly collaborators: AssemblerCollaborators,
    private readonly options: AssemblerOptions
  ) {}

  async build(
    requirements: Requirement[],
    evidence: LocalizationEvidence[],
    context: BuildContext
  ): Promise<Report> {
    const digest: EvidenceDigest = {
      requirements,
      evidence,
      languages: context.languages,
      manifests: context.manifests,
    };

    this.options.onProgress?.("Summarizing execution plan...");
    const plan = await withFallback(
      () => this.collaborators.summarizer.summarize(digest),
      (reason) => unavailable("Execution plan", reason)
    );
    if (plan.failure) {
      this.options.onProgress?.(`Execution plan unavailable: ${plan.failure}`);
    }

    const verification = context.verify ? await this.verify(digest) : undefined;

    return assembleReport({
      requirements,
      evidence,
      executionPlan: plan.value,
      topK: this.options.topK,
      ...(verification ? { verification } : {}),
    });
  }

  private async verify(digest: EvidenceDigest): Promise<FunctionalVerification> {
    this.options.onProgress?.("Generating verification test...");
    const code = await withFallback(
      () => this.collaborators.testGenerator.generateTest(digest),
      (reason) => unavailable("Test code", reason)
    );
    if (code.failure) {
      this.options.onProgress?.(`Test code unavailable: ${code.failure}`);
    }

    const runner = this.collaborators.testRunner;
    if (!runner || code.failure) {
      return { generated_test_code: code.value, execution_result: { ...NOT_EXECUTED } };
    }

    this.options.onProgress?.("Running verification test...");
    const execution = await withFallback(
      () => runner.run(code.value, digest),
      (reason): ExecutionResult => ({ tests_passed: false, log: unavailable("Test execution log", reason) })
    );
    return { generated_test_code: code.value, execution_result: execution.value };
  }
}
