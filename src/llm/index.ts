import type { ChangedFile, DocSyncSettings } from "../types";

export interface GenerationContext {
  filePath: string;
  currentContent: string;
  pullRequest: { number: number; title: string };
  diff: ChangedFile[];
  styleGuide?: string;
}

/**
 * Produces the complete new text of one documentation file. Implementations
 * may be slow and may fail; callers bound them with a timeout.
 */
export interface ContentGenerator {
  generate(context: GenerationContext, instruction: string): Promise<string>;
}

export type PromptMessages = [
  { role: "system"; content: string },
  { role: "user"; content: string },
];

const MAX_PATCH_CHARS = 4000;
const MAX_DIFF_CHARS = 24000;

export function renderDiff(files: ChangedFile[]): string {
  let budget = MAX_DIFF_CHARS;
  const sections: string[] = [];

  for (const file of files) {
    if (budget <= 0) {
      sections.push(`(${files.length - sections.length} more files omitted)`);
      break;
    }
    const patch =
      file.patch.length > MAX_PATCH_CHARS
        ? `${file.patch.slice(0, MAX_PATCH_CHARS)}\n... (truncated)`
        : file.patch;
    const section = `File: ${file.filename} (${file.status})
\`\`\`diff
${patch}
\`\`\``;
    budget -= section.length;
    sections.push(section);
  }

  return sections.length > 0 ? sections.join("\n\n") : "No code changes in this pull request.";
}

export function buildMessages(context: GenerationContext, instruction: string): PromptMessages {
  return [
    {
      role: "system",
      content: `You are a technical documentation expert maintaining ${context.filePath}.
You receive the current file, the code changes of a pull request and an instruction from a reviewer.

Formatting Rules:
1. Return the complete Markdown file, not a fragment or a diff
2. Keep existing headings, anchors and badges unless the instruction says otherwise
3. Always add a blank line before and after code blocks and give them a language tag
4. Use proper heading spacing: "## Heading" not "##Heading"
5. IMPORTANT: Return the Markdown content directly, do not wrap it in backticks

Content Guidelines:
- Be precise and technical
- Only document behaviour that the code changes or the current file support
- Change nothing beyond what the instruction asks for${
        context.styleGuide ? `\n\nStyle Guide:\n${context.styleGuide}` : ""
      }`,
    },
    {
      role: "user",
      content: `Instruction: ${instruction}

Pull request #${context.pullRequest.number}: ${context.pullRequest.title}

Code changes:
${renderDiff(context.diff)}

Current content of ${context.filePath}:
${context.currentContent}

Please provide the complete updated content of ${context.filePath}.`,
    },
  ];
}

// Clean up any accidental backtick wrapping
export function cleanGeneratedContent(content: string): string {
  return content.replace(/^```(?:markdown|md)?\n/, "").replace(/\n?```\s*$/, "");
}

// Generated text follows the trailing-newline convention of the file it replaces
export function matchTrailingNewline(content: string, reference: string): string {
  const trimmed = content.replace(/\n+$/, "");
  return reference.endsWith("\n") ? `${trimmed}\n` : trimmed;
}

export type LlmConfig = DocSyncSettings["llmConfig"];
