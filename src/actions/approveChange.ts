import { NothingPendingError } from "../errors";
import type { HistoryEntry, Session } from "../types";
import { primaryHandle, withoutPending } from "./types";
import type { ActionContext, ActionOutcome } from "./types";

export async function approveChange(ctx: ActionContext, session: Session): Promise<ActionOutcome> {
  const pending = session.pendingChange;
  if (!pending) {
    throw new NothingPendingError("approve", primaryHandle(ctx.settings));
  }

  const commit = await ctx.applier.apply(
    ctx.pullRequest.number,
    pending.filePath,
    pending.content,
    {
      message: `docs: ${pending.actionKind.replace("_", " ")} ${pending.filePath}\n\nRequested by @${pending.requestedBy}, approved by @${ctx.author}.`,
      expectedContent: pending.baseContent,
    }
  );

  const entry: HistoryEntry = {
    id: (session.history.at(-1)?.id ?? 0) + 1,
    kind: "apply",
    filePath: pending.filePath,
    previousContent: commit.previousContent,
    newContent: pending.content,
    commitSha: commit.sha,
    author: ctx.author,
    appliedAt: ctx.now().toISOString(),
  };
  const updated = await ctx.store.appendHistory(session.key, entry);

  const shortSha = commit.sha.slice(0, 7);
  return {
    session: { ...withoutPending(updated), approvalState: "applied" },
    reply: `✅ Committed the change to \`${pending.filePath}\` on \`${commit.branch}\` (${shortSha}). Reply \`@${primaryHandle(ctx.settings)} revert\` to undo it.`,
    notification: `📚 ${ctx.author} approved a DocSync change to ${pending.filePath} in ${ctx.host.repository}#${ctx.pullRequest.number} (${shortSha})`,
  };
}
