import { describe, expect, it } from "vitest";
import { buildMessages, cleanGeneratedContent, matchTrailingNewline, renderDiff } from "../llm";
import type { GenerationContext } from "../llm";
import { createContentGenerator } from "../llm/factory";
import { GroqContentGenerator } from "../llm/groq";
import { OpenAIContentGenerator } from "../llm/openai";

const context: GenerationContext = {
  filePath: "README.md",
  currentContent: "# Widgets\n",
  pullRequest: { number: 3, title: "Add retries" },
  diff: [{ filename: "src/retry.ts", status: "added", patch: "+export function retry() {}" }],
};

describe("buildMessages", () => {
  it("puts the instruction, diff and current file in the user message", () => {
    const [, user] = buildMessages(context, "Fix the intro.");

    expect(user.content).toBe(
      [
        "Instruction: Fix the intro.",
        "",
        "Pull request #3: Add retries",
        "",
        "Code changes:",
        "File: src/retry.ts (added)",
        "```diff",
        "+export function retry() {}",
        "```",
        "",
        "Current content of README.md:",
        "# Widgets",
        "",
        "",
        "Please provide the complete updated content of README.md.",
      ].join("\n")
    );
  });

  it("appends the style guide to the system message", () => {
    const [plain] = buildMessages(context, "Fix the intro.");
    const [styled] = buildMessages({ ...context, styleGuide: "Use British spelling." }, "Fix the intro.");

    expect(plain.content.startsWith("You are a technical documentation expert maintaining README.md.")).toBe(true);
    expect(plain.content.endsWith("- Change nothing beyond what the instruction asks for")).toBe(true);
    expect(styled.content).toBe(`${plain.content}\n\nStyle Guide:\nUse British spelling.`);
  });
});

describe("renderDiff", () => {
  it("describes an empty diff", () => {
    expect(renderDiff([])).toBe("No code changes in this pull request.");
  });

  it("truncates long patches", () => {
    const rendered = renderDiff([{ filename: "src/big.ts", status: "modified", patch: "+x".repeat(3000) }]);

    expect(rendered).toBe(`File: src/big.ts (modified)\n\`\`\`diff\n${"+x".repeat(2000)}\n... (truncated)\n\`\`\``);
  });

  it("omits files once the budget is spent", () => {
    const files = Array.from({ length: 10 }, (_, index) => ({
      filename: `src/file${index}.ts`,
      status: "modified" as const,
      patch: "+y".repeat(2500),
    }));

    const sections = renderDiff(files).split("\n\n");

    expect(sections).toHaveLength(7);
    expect(sections[6]).toBe("(4 more files omitted)");
  });
});

describe("cleanGeneratedContent", () => {
  it.each([
    ["```markdown\n# Title\n```", "# Title"],
    ["```md\n# Title\n```\n", "# Title"],
    ["```\n# Title\n```", "# Title"],
    ["# Title\n", "# Title\n"],
  ])("cleans %j", (raw, expected) => {
    expect(cleanGeneratedContent(raw)).toBe(expected);
  });
});

describe("matchTrailingNewline", () => {
  it("follows the reference file", () => {
    expect(matchTrailingNewline("# A\n\n\n", "# B\n")).toBe("# A\n");
    expect(matchTrailingNewline("# A", "# B\n")).toBe("# A\n");
    expect(matchTrailingNewline("# A\n", "# B")).toBe("# A");
  });
});

describe("createContentGenerator", () => {
  const llm = { model: "test-model", temperature: 0.3 };

  it("builds the generator for the configured provider", () => {
    expect(createContentGenerator({ ...llm, provider: "openai" }, { openAiKey: "test-key" }, 1000)).toBeInstanceOf(
      OpenAIContentGenerator
    );
    expect(createContentGenerator({ ...llm, provider: "groq" }, { groqKey: "test-key" }, 1000)).toBeInstanceOf(
      GroqContentGenerator
    );
  });

  it("requires the provider's key", () => {
    expect(() => createContentGenerator({ ...llm, provider: "openai" }, { groqKey: "test-key" }, 1000)).toThrow(
      "OpenAI API key is required"
    );
    expect(() => createContentGenerator({ ...llm, provider: "groq" }, {}, 1000)).toThrow("Groq API key is required");
  });
});
