import { NoHistoryError } from "../errors";
import type { HistoryEntry, Session } from "../types";
import { withoutPending } from "./types";
import type { ActionContext, ActionOutcome } from "./types";

/**
 * Restores the file touched by the most recent history entry to the content
 * it had before that entry. History is never rewritten: the restore is
 * recorded as a new "revert" entry, so reverting twice re-applies. Any
 * pending proposal is dropped.
 */
export async function revertChange(ctx: ActionContext, session: Session): Promise<ActionOutcome> {
  const last = session.history.at(-1);
  if (!last) {
    throw new NoHistoryError();
  }

  const shortSha = last.commitSha.slice(0, 7);
  const commit = await ctx.applier.apply(
    ctx.pullRequest.number,
    last.filePath,
    last.previousContent,
    {
      message: `docs: revert ${last.filePath} to its state before ${shortSha}\n\nRequested by @${ctx.author}.`,
      expectedContent: last.newContent,
    }
  );

  const entry: HistoryEntry = {
    id: last.id + 1,
    kind: "revert",
    filePath: last.filePath,
    previousContent: commit.previousContent,
    newContent: last.previousContent,
    commitSha: commit.sha,
    author: ctx.author,
    appliedAt: ctx.now().toISOString(),
    revertsEntryId: last.id,
  };
  const updated = await ctx.store.appendHistory(session.key, entry);

  // A pending proposal was computed from the text the revert just replaced
  const discarded = updated.pendingChange;
  return {
    session: { ...withoutPending(updated), approvalState: "applied" },
    reply: `↩️ Reverted \`${last.filePath}\` to its state before ${shortSha} (${commit.sha.slice(0, 7)}).${
      discarded
        ? ` The pending proposal for \`${discarded.filePath}\` was based on the old text and has been discarded.`
        : ""
    }`,
    notification: `↩️ ${ctx.author} reverted a DocSync change to ${last.filePath} in ${ctx.host.repository}#${ctx.pullRequest.number}`,
  };
}
