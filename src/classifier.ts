import type { ChangedFile, CodeChange, DiffSummary, SignificanceVerdict } from "./types";

export interface SignificanceClassifier {
  classify(diff: DiffSummary): Promise<SignificanceVerdict>;
}

const DOC_EXTENSIONS = [".md", ".mdx", ".txt", ".rst"];

const isTestFile = (filename: string): boolean =>
  filename.includes(".test.") ||
  filename.includes(".spec.") ||
  filename.includes("__tests__/") ||
  filename.startsWith("test/") ||
  filename.startsWith("tests/");

const isDocumentationFile = (filename: string): boolean =>
  DOC_EXTENSIONS.some((extension) => filename.toLowerCase().endsWith(extension)) ||
  filename.startsWith("docs/");

// Only lines the patch adds are inspected
function addedLines(patch: string): string {
  return patch
    .split("\n")
    .filter((line) => line.startsWith("+") && !line.startsWith("+++"))
    .join("\n");
}

export function analyzeFile(file: ChangedFile): CodeChange {
  const added = addedLines(file.patch);
  return {
    file: file.filename,
    type: file.status,
    significance: {
      hasExports: /\bexport\s/.test(added),
      hasInterfaces: /\binterface\s/.test(added),
      hasClasses: /\bclass\s/.test(added),
      hasTypes: /\btype\s+\w+/.test(added),
      hasEnums: /\benum\s/.test(added),
      isTest: isTestFile(file.filename),
      isDocumentation: isDocumentationFile(file.filename),
    },
  };
}

/**
 * Treats a merge as worth a documentation pass when a source file (not a
 * test or a doc) is added or removed, or its patch adds exported or
 * type-level declarations.
 */
export class HeuristicClassifier implements SignificanceClassifier {
  async classify(diff: DiffSummary): Promise<SignificanceVerdict> {
    const changes = diff.files.map(analyzeFile);
    const sourceChanges = changes.filter(
      (change) => !change.significance.isTest && !change.significance.isDocumentation
    );

    const structural = sourceChanges.filter(
      (change) => change.type === "added" || change.type === "removed"
    );
    if (structural.length > 0) {
      return {
        significant: true,
        reason: `${structural.length} source file(s) added or removed: ${structural
          .map((change) => change.file)
          .join(", ")}`,
        changes,
      };
    }

    const apiChanges = sourceChanges.filter((change) => {
      const { hasExports, hasInterfaces, hasClasses, hasTypes, hasEnums } = change.significance;
      return hasExports || hasInterfaces || hasClasses || hasTypes || hasEnums;
    });
    if (apiChanges.length > 0) {
      return {
        significant: true,
        reason: `Public API changes in ${apiChanges.map((change) => change.file).join(", ")}`,
        changes,
      };
    }

    return {
      significant: false,
      reason:
        sourceChanges.length === 0
          ? "Only tests or documentation changed"
          : "No exported or type-level changes",
      changes,
    };
  }
}
