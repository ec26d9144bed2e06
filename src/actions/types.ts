import type { ChangeApplier } from "../applier";
import type { VersionControlHost } from "../host";
import type { ContentGenerator } from "../llm";
import type { Logger } from "../logger";
import type { SessionStore } from "../sessionStore";
import type { DocSyncSettings, PullRequestInfo, Session } from "../types";

export interface ActionContext {
  host: VersionControlHost;
  store: SessionStore;
  generator: ContentGenerator;
  applier: ChangeApplier;
  settings: DocSyncSettings;
  logger: Logger;
  now: () => Date;
  pullRequest: PullRequestInfo;
  author: string;
}

export interface ActionOutcome {
  reply: string;
  session?: Session; // Saved by the coordinator when present
  notification?: string;
}

export function withoutPending(session: Session): Session {
  const next = { ...session };
  delete next.pendingChange;
  return next;
}

export const primaryHandle = (settings: DocSyncSettings): string =>
  settings.addressing.botHandles[0] ?? "docbot";
