import { NothingPendingError } from "../errors";
import type { Session } from "../types";
import { primaryHandle, withoutPending } from "./types";
import type { ActionContext, ActionOutcome } from "./types";

export async function rejectChange(ctx: ActionContext, session: Session): Promise<ActionOutcome> {
  const pending = session.pendingChange;
  if (!pending) {
    throw new NothingPendingError("reject", primaryHandle(ctx.settings));
  }

  ctx.logger.info("Discarding proposal", { filePath: pending.filePath });
  return {
    session: { ...withoutPending(session), approvalState: "discarded" },
    reply: `🗑️ Discarded the proposed change to \`${pending.filePath}\`. Nothing was committed.`,
  };
}
