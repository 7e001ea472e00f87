import * as path from "path";

import type { Language, LocalizationEvidence, Requirement } from "../types";
import { toLocation } from "../location";
import type { EvidenceDigest, Summarizer, TestGenerator } from "./collaborators";

export type ProjectType = "nodejs" | "python" | "java" | "dotnet" | "cpp" | "unknown";

const ECMASCRIPT: Language[] = ["javascript", "typescript", "tsx", "jsx"];

type RequirementCase = {
  ordinal: number;
  title: string;
  note: string;
};

export function detectProjectType(languages: readonly Language[], manifests: readonly string[]): ProjectType {
  const has = (language: Language) => languages.includes(language);
  if (manifestNames(manifests).has("package.json") && ECMASCRIPT.some(has)) { return "nodejs"; }
  if (has("python")) { return "python"; }
  if (has("java")) { return "java"; }
  if (has("csharp")) { return "dotnet"; }
  if (has("cpp")) { return "cpp"; }
  return "unknown";
}

export function suggestExecutionPlan(projectType: ProjectType, manifests: readonly string[]): string {
  const names = manifestNames(manifests);
  switch (projectType) {
    case "nodejs":
      return "Install dependencies with `npm install`, then start the service with `npm run start`.";
    case "python":
      if (names.has("requirements.txt")) {
        return "Install dependencies with `pip install -r requirements.txt`, then run `python main.py` or the project's entry script.";
      }
      if (names.has("pyproject.toml") || names.has("setup.py")) {
        return "Install the project with `pip install .`, then run `python main.py` or the project's entry script.";
      }
      return "Run `python main.py` or the project's entry script.";
    case "java":
      if (names.has("pom.xml")) {
        return "Build the project with `mvn package`, then run the generated JAR from `target/` with `java -jar`.";
      }
      if (names.has("build.gradle") || names.has("build.gradle.kts")) {
        return "Build the project with `gradle build`, then run the generated JAR from `build/libs/` with `java -jar`.";
      }
      return "Build the project with Maven or Gradle, then run the generated JAR.";
    case "dotnet":
      return "Restore dependencies with `dotnet restore`, then start the service with `dotnet run`.";
    case "cpp":
      if (names.has("CMakeLists.txt")) {
        return "Configure and build with `cmake -S . -B build && cmake --build build`, then run the produced binary.";
      }
      if (names.has("Makefile")) {
        return "Build with `make`, then run the produced binary.";
      }
      return "Compile the sources with a C++ compiler, then run the produced binary.";
    case "unknown":
      return "Build and start the project following the usual workflow for its project type.";
  }
}

/** Deterministic summary: a run plan for the detected project type plus a per-requirement checklist. */
export class HeuristicSummarizer implements Summarizer {
  async summarize(digest: EvidenceDigest): Promise<string> {
    const projectType = detectProjectType(digest.languages, digest.manifests);
    const plan = suggestExecutionPlan(projectType, digest.manifests);
    if (digest.requirements.length === 0) { return plan; }

    const checklist = requirementCases(digest).map((item) => `${item.ordinal}. ${item.title}: ${item.note}`);
    return [plan, "", "Requirements to verify:", ...checklist].join("\n");
  }
}

/** Writes a test skeleton in the project's usual framework, one case per requirement. */
export class HeuristicTestGenerator implements TestGenerator {
  async generateTest(digest: EvidenceDigest): Promise<string> {
    const projectType = detectProjectType(digest.languages, digest.manifests);
    return generateTestSkeleton(projectType, requirementCases(digest));
  }
}

function generateTestSkeleton(projectType: ProjectType, cases: RequirementCase[]): string {
  const header = `Generated test skeleton for a ${projectLabel(projectType)} project. Adapt it to the project's structure before running.`;

  switch (projectType) {
    case "nodejs":
      return [
        `// ${header}`,
        `const assert = require("assert");`,
        "",
        `describe("Requirement coverage", () => {`,
        ...cases.flatMap((item) => [
          `  it(${JSON.stringify(`${item.ordinal}. ${item.title}`)}, () => {`,
          `    // ${item.note}`,
          "    assert.ok(true);",
          "  });",
        ]),
        "});",
        "",
      ].join("\n");
    case "python":
      return [
        `# ${header}`,
        "import unittest",
        "",
        "",
        "class TestRequirements(unittest.TestCase):",
        ...(cases.length === 0 ? ["    pass"] : []),
        ...cases.flatMap((item) => [
          `    def test_requirement_${item.ordinal}(self):`,
          `        # ${item.title}`,
          `        # ${item.note}`,
          "        self.assertTrue(True)",
          "",
        ]),
        "",
        `if __name__ == "__main__":`,
        "    unittest.main()",
        "",
      ].join("\n");
    case "java":
      return [
        `// ${header}`,
        "import org.junit.jupiter.api.DisplayName;",
        "import org.junit.jupiter.api.Test;",
        "",
        "import static org.junit.jupiter.api.Assertions.assertTrue;",
        "",
        "class RequirementsTest {",
        ...cases.flatMap((item) => [
          "    @Test",
          `    @DisplayName(${JSON.stringify(`${item.ordinal}. ${item.title}`)})`,
          `    void requirement${item.ordinal}() {`,
          `        // ${item.note}`,
          "        assertTrue(true);",
          "    }",
        ]),
        "}",
        "",
      ].join("\n");
    case "dotnet":
      return [
        `// ${header}`,
        "using Xunit;",
        "",
        "public class RequirementsTests",
        "{",
        ...cases.flatMap((item) => [
          `    [Fact(DisplayName = ${JSON.stringify(`${item.ordinal}. ${item.title}`)})]`,
          `    public void Requirement${item.ordinal}()`,
          "    {",
          `        // ${item.note}`,
          "        Assert.True(true);",
          "    }",
        ]),
        "}",
        "",
      ].join("\n");
    case "cpp":
    case "unknown":
      return [
        `// ${header}`,
        ...cases.map((item) => `// ${item.ordinal}. ${item.title}: ${item.note}`),
        "",
      ].join("\n");
  }
}

function requirementCases(digest: EvidenceDigest): RequirementCase[] {
  return digest.requirements.map((requirement) => ({
    ordinal: requirement.ordinal,
    title: requirement.text,
    note: describeBestMatch(requirement, digest.evidence),
  }));
}

function describeBestMatch(requirement: Requirement, evidence: readonly LocalizationEvidence[]): string {
  const best = evidence
    .filter((item) => item.requirementOrdinal === requirement.ordinal)
    .reduce<LocalizationEvidence | undefined>((top, item) => (!top || item.score > top.score ? item : top), undefined);
  if (!best) { return "no implementation located"; }
  const location = toLocation(best.unit);
  return `${location.file} ${location.function} (lines ${location.lines})`;
}

function manifestNames(manifests: readonly string[]): Set<string> {
  return new Set(manifests.map((manifest) => path.posix.basename(manifest)));
}

function projectLabel(projectType: ProjectType): string {
  switch (projectType) {
    case "nodejs": return "Node.js";
    case "python": return "Python";
    case "java": return "Java";
    case "dotnet": return ".NET";
    case "cpp": return "C++";
    case "unknown": return "generic";
  }
}
