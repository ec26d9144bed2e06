export type DocSyncErrorCode =
  | "sanitization_rejected"
  | "context_error"
  | "generation_failed"
  | "apply_failed"
  | "forbidden_file"
  | "stale_file"
  | "nothing_pending"
  | "no_history"
  | "timeout";

/**
 * Base class for every failure the bot answers with a comment. `reply` is
 * the text posted back to the pull request thread.
 */
export class DocSyncError extends Error {
  constructor(
    readonly code: DocSyncErrorCode,
    message: string,
    readonly reply: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type BlockedCategory =
  | "credentials"
  | "non_documentation_file"
  | "infrastructure"
  | "version_control";

export type SanitizationReason =
  | { kind: "blocked_pattern"; category: BlockedCategory; patterns: string[] }
  | { kind: "too_short"; length: number; minimum: number }
  | { kind: "too_long"; length: number; maximum: number };

const CATEGORY_LABELS: Record<BlockedCategory, string> = {
  credentials: "secret or credential references",
  non_documentation_file: "references to non-documentation files",
  infrastructure: "infrastructure terms",
  version_control: "version-control operations",
};

export function describeSanitizationReason(reason: SanitizationReason): string {
  switch (reason.kind) {
    case "blocked_pattern":
      return `it contains ${CATEGORY_LABELS[reason.category]} (${reason.patterns
        .map((pattern) => `\`${pattern}\``)
        .join(", ")})`;
    case "too_short":
      return `the feedback is too short (${reason.length} characters, at least ${reason.minimum} needed)`;
    case "too_long":
      return `the comment is too long (${reason.length} characters, at most ${reason.maximum} allowed)`;
  }
}

export class SanitizationRejection extends DocSyncError {
  constructor(readonly reason: SanitizationReason) {
    const description = describeSanitizationReason(reason);
    super(
      "sanitization_rejected",
      `Comment rejected: ${description}`,
      `🚫 I can't act on this comment because ${description}. Please rephrase your request.`
    );
  }
}

export class ContextError extends DocSyncError {
  constructor(message: string, reply?: string) {
    super("context_error", message, reply ?? `⚠️ ${message}`);
  }
}

export class TimeoutError extends DocSyncError {
  constructor(readonly operation: string, readonly timeoutMs: number) {
    super(
      "timeout",
      `${operation} timed out after ${timeoutMs}ms`,
      `⏱️ ${operation} timed out after ${Math.round(timeoutMs / 1000)}s.`
    );
  }
}

export class GenerationError extends DocSyncError {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(
      "generation_failed",
      `Content generation failed: ${detail}`,
      `❌ I couldn't generate a proposal (${detail}). Any pending proposal is unchanged; re-issue the command to try again.`,
      { cause }
    );
  }
}

export class ApplyError extends DocSyncError {
  constructor(
    cause: unknown,
    options: { code?: "apply_failed" | "forbidden_file" | "stale_file"; message?: string; reply?: string } = {}
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(
      options.code ?? "apply_failed",
      options.message ?? `Commit failed: ${detail}`,
      options.reply ??
        `❌ Committing the change failed (${detail}). Nothing was committed; re-issue the command to try again.`,
      { cause }
    );
  }
}

export class ForbiddenFileError extends ApplyError {
  constructor(readonly filePath: string, allowList: string[], detail = "is not in the allow-list") {
    super(new Error(`${filePath} ${detail}`), {
      code: "forbidden_file",
      message: `Refusing to write ${filePath}: ${detail}`,
      reply: `🚫 I can only edit ${allowList.map((file) => `\`${file}\``).join(", ")}; \`${filePath}\` ${detail}.`,
    });
  }
}

/**
 * The file on the branch is no longer the text a change was computed from:
 * someone pushed to it, or an earlier commit that timed out landed late.
 */
export class StaleFileError extends ApplyError {
  constructor(readonly filePath: string, branch: string, alreadyApplied: boolean) {
    const detail = alreadyApplied
      ? `\`${filePath}\` on \`${branch}\` already contains this change, probably from an earlier commit that finished after its timeout`
      : `\`${filePath}\` changed on \`${branch}\` since this change was prepared`;
    super(new Error(`${filePath} changed on ${branch}`), {
      code: "stale_file",
      message: `Refusing to overwrite ${filePath}: the branch no longer has the expected content`,
      reply: `⚠️ ${detail}. Nothing was committed; reject the proposal or ask for the change again to get a fresh one.`,
    });
  }
}

export class NothingPendingError extends DocSyncError {
  constructor(action: "approve" | "reject", handle = "docbot") {
    super(
      "nothing_pending",
      `Nothing pending to ${action}`,
      `ℹ️ There is nothing pending to ${action}. Ask for a change first, e.g. \`@${handle} expand installation steps\`.`
    );
  }
}

export class NoHistoryError extends DocSyncError {
  constructor() {
    super(
      "no_history",
      "No applied change to revert",
      "ℹ️ There is no applied change to revert on this pull request."
    );
  }
}

export function replyForError(error: unknown): string {
  if (error instanceof DocSyncError) {
    return error.reply;
  }
  const detail = error instanceof Error ? error.message : String(error);
  return `❌ Something went wrong while handling your command: ${detail}`;
}
