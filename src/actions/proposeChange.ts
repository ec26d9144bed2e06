import { previewDiff } from "../diffPreview";
import { ContextError, GenerationError } from "../errors";
import { withTimeout } from "../lib/timeout";
import { matchTrailingNewline } from "../llm";
import type { ChangedFile, PendingChange, RefinementCommand, Session } from "../types";
import { primaryHandle } from "./types";
import type { ActionContext, ActionOutcome } from "./types";

export function buildInstruction(command: RefinementCommand): string {
  const target = command.target;
  let instruction: string;
  switch (command.actionKind) {
    case "update":
      instruction = `Update the documentation about ${target} so it matches the code changes.`;
      break;
    case "clarify":
      instruction = `Clarify ${target}: rewrite it so it is easier to understand without changing its meaning.`;
      break;
    case "add_example":
      instruction = `Add a short, working usage example for ${target}.`;
      break;
    case "expand":
      instruction = `Expand ${target} with more detail.`;
      break;
    case "fix":
      instruction = `Fix ${target}.`;
      break;
    case "freeform":
      instruction = `Apply this reviewer feedback: ${target}`;
      break;
  }
  return `${instruction}\n\nFull reviewer comment:\n${command.rawText}`;
}

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Picks the file a command is about: an allow-listed file named in the
 * target ("CLAUDE.md" or just "claude"), else the first allow-listed file the
 * pull request touches, else the first allow-list entry.
 */
export function resolveTargetFile(target: string, allowList: string[], diff: ChangedFile[]): string {
  const lower = target.toLowerCase();
  const named = allowList.find((file) => {
    const stem = file.replace(/\.[^.]+$/, "").toLowerCase();
    return lower.includes(file.toLowerCase()) || new RegExp(`\\b${escapeRegExp(stem)}\\b`).test(lower);
  });
  if (named) return named;

  const touched = allowList.find((file) => diff.some((change) => change.filename === file));
  return touched ?? allowList[0];
}

function formatProposal(pending: PendingChange, replaced: boolean, handle: string): string {
  const preview = previewDiff(pending.baseContent, pending.content);
  const subject = pending.target ? `${pending.actionKind}: ${pending.target}` : pending.actionKind;
  return [
    `📝 Proposed change to \`${pending.filePath}\` (${subject})${replaced ? ", replacing the previous proposal" : ""}`,
    "",
    "````diff",
    preview.text,
    "````",
    "",
    `+${preview.added} / -${preview.removed} lines. Reply \`@${handle} approve\` to commit it or \`@${handle} reject\` to discard it.`,
  ].join("\n");
}

export async function proposeChange(
  ctx: ActionContext,
  command: RefinementCommand,
  session: Session
): Promise<ActionOutcome> {
  const pr = ctx.pullRequest;
  const diff = await ctx.host.getPullRequestDiff(pr.number);
  const filePath = resolveTargetFile(command.target, ctx.settings.allowList, diff);

  const current = await ctx.host.getFileContent(filePath, pr.headRef);
  if (!current) {
    throw new ContextError(`\`${filePath}\` does not exist on \`${pr.headRef}\`, so there is nothing to refine.`);
  }

  ctx.logger.info("Generating proposal", { filePath, actionKind: command.actionKind });
  let generated: string;
  try {
    generated = await withTimeout(
      ctx.generator.generate(
        {
          filePath,
          currentContent: current.content,
          pullRequest: { number: pr.number, title: pr.title },
          diff,
          styleGuide: ctx.settings.llmConfig.styleGuide,
        },
        buildInstruction(command)
      ),
      ctx.settings.timeouts.generationMs,
      "Generating the proposal"
    );
  } catch (error) {
    ctx.logger.warn("Generation failed", { filePath }, error);
    throw new GenerationError(error);
  }

  const content = matchTrailingNewline(generated, current.content);
  if (content === current.content) {
    return {
      reply: `🤷 The generated text for \`${filePath}\` is identical to the current file, so there is nothing to propose. Try a more specific request.`,
    };
  }

  const pendingChange: PendingChange = {
    filePath,
    content,
    baseContent: current.content,
    actionKind: command.actionKind,
    target: command.target,
    requestedBy: ctx.author,
    createdAt: ctx.now().toISOString(),
  };

  return {
    session: { ...session, pendingChange, approvalState: "awaiting_approval" },
    reply: formatProposal(pendingChange, session.pendingChange !== undefined, primaryHandle(ctx.settings)),
  };
}
