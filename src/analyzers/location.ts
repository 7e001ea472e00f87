import type { CodeUnit, ImplementationLocation } from "./types";

// Methods are reported with their class so same-named methods stay distinguishable
export function qualifiedName(unit: CodeUnit): string {
  return unit.kind === "method" && unit.enclosingUnit ? `${unit.enclosingUnit.name}.${unit.name}` : unit.name;
}

export function toLocation(unit: CodeUnit): ImplementationLocation {
  return {
    file: unit.filePath,
    function: qualifiedName(unit),
    lines: `${unit.startLine}-${unit.endLine}`,
  };
}
