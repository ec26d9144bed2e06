import { approveChange, proposeChange, rejectChange, revertChange } from "./actions";
import type { ActionContext, ActionOutcome } from "./actions";
import { isAddressedToBot } from "./addressing";
import { ChangeApplier } from "./applier";
import { ContextError, DocSyncError, replyForError } from "./errors";
import { isDocSyncPullRequest } from "./host";
import type { VersionControlHost } from "./host";
import type { ContentGenerator } from "./llm";
import type { Logger } from "./logger";
import { NoopNotifier, notifyInBackground } from "./notify";
import type { Notifier } from "./notify";
import { parseCommand } from "./parser";
import { sanitize } from "./sanitizer";
import { sessionKey } from "./sessionStore";
import type { SessionStore } from "./sessionStore";
import type { Command, DocSyncSettings, Session } from "./types";

export interface RefinementCoordinatorOptions {
  host: VersionControlHost;
  store: SessionStore;
  generator: ContentGenerator;
  settings: DocSyncSettings;
  logger: Logger;
  notifier?: Notifier;
  applier?: ChangeApplier;
  now?: () => Date;
}

export type CoordinatorPhase = "idle" | "awaiting_approval";

export function phaseOf(session: Session): CoordinatorPhase {
  return session.pendingChange ? "awaiting_approval" : "idle";
}

function dispatch(ctx: ActionContext, command: Command, session: Session): Promise<ActionOutcome> {
  switch (command.actionKind) {
    case "approve":
      return approveChange(ctx, session);
    case "reject":
      return rejectChange(ctx, session);
    case "revert":
      return revertChange(ctx, session);
    case "update":
    case "clarify":
    case "add_example":
    case "expand":
    case "fix":
    case "freeform":
      return proposeChange(ctx, command, session);
    default: {
      const unhandled: never = command;
      throw new Error(`Unhandled command: ${JSON.stringify(unhandled)}`);
    }
  }
}

/**
 * Turns pull request comments into proposals, commits and reverts for one
 * repository. Every comment addressed to the bot gets exactly one reply,
 * except ones that do not parse as a command.
 */
export class RefinementCoordinator {
  private readonly host: VersionControlHost;
  private readonly store: SessionStore;
  private readonly generator: ContentGenerator;
  private readonly settings: DocSyncSettings;
  private readonly logger: Logger;
  private readonly notifier: Notifier;
  private readonly applier: ChangeApplier;
  private readonly now: () => Date;

  constructor(options: RefinementCoordinatorOptions) {
    this.host = options.host;
    this.store = options.store;
    this.generator = options.generator;
    this.settings = options.settings;
    this.logger = options.logger;
    this.notifier = options.notifier ?? new NoopNotifier();
    this.now = options.now ?? (() => new Date());
    this.applier =
      options.applier ??
      new ChangeApplier(
        options.host,
        { allowList: options.settings.allowList, commitTimeoutMs: options.settings.timeouts.commitMs },
        options.logger.child("applier")
      );
  }

  async handleCommentEvent(
    pullRequestId: number,
    commentText: string,
    author: string
  ): Promise<string | null> {
    const { addressing } = this.settings;
    if (!isAddressedToBot(commentText, addressing)) {
      return null;
    }

    const key = sessionKey(this.host.repository, pullRequestId);
    const logger = this.logger.child(key);

    const sanitized = sanitize(commentText, { ...this.settings.sanitizer, addressing });
    if (!sanitized.ok) {
      logger.warn("Comment rejected by sanitizer", { author, reason: sanitized.rejection.reason });
      return this.reply(pullRequestId, sanitized.rejection.reply, logger);
    }

    const parsed = parseCommand(sanitized.value, addressing);
    if (!parsed.ok) {
      logger.debug("Ignoring comment that is not a command", { author });
      return null;
    }

    const command = parsed.command;
    logger.info("📥 Command received", { author, actionKind: command.actionKind, target: command.target });

    let reply: string;
    try {
      reply = await this.store.withLock(key, async () => {
        try {
          const outcome = await this.run(pullRequestId, key, command, author, logger);
          if (outcome.session) {
            await this.store.save(outcome.session);
            logger.info("Session updated", {
              phase: phaseOf(outcome.session),
              approvalState: outcome.session.approvalState,
              historyLength: outcome.session.history.length,
            });
          }
          if (outcome.notification) {
            notifyInBackground(this.notifier, outcome.notification, logger);
          }
          return outcome.reply;
        } catch (error) {
          if (error instanceof DocSyncError) {
            logger.warn("Command failed", { actionKind: command.actionKind, code: error.code }, error);
          } else {
            logger.error("Unexpected error while handling command", { actionKind: command.actionKind }, error);
          }
          return replyForError(error);
        }
      });
    } catch (error) {
      logger.error("Could not lock session", {}, error);
      reply = replyForError(error);
    }

    return this.reply(pullRequestId, reply, logger);
  }

  private async run(
    pullRequestId: number,
    key: string,
    command: Command,
    author: string,
    logger: Logger
  ): Promise<ActionOutcome> {
    const pullRequest = await this.host.getPullRequest(pullRequestId);
    if (!isDocSyncPullRequest(pullRequest, this.settings.origin)) {
      throw new ContextError(
        `This pull request was not created by DocSync (no \`${this.settings.origin.label}\` label or "${this.settings.origin.titleMarker}" title), so I can't change it.`
      );
    }

    const session = await this.store.get(key);
    if (session.closed || pullRequest.state === "closed") {
      throw new ContextError("This pull request is closed; DocSync commands no longer apply to it.");
    }

    return dispatch(
      {
        host: this.host,
        store: this.store,
        generator: this.generator,
        applier: this.applier,
        settings: this.settings,
        logger,
        now: this.now,
        pullRequest,
        author,
      },
      command,
      session
    );
  }

  private async reply(threadId: number, body: string, logger: Logger): Promise<string> {
    try {
      await this.host.postComment(threadId, body);
    } catch (error) {
      logger.error("Failed to post reply", { threadId }, error);
    }
    return body;
  }
}
