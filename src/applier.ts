import { ApplyError, DocSyncError, ForbiddenFileError, StaleFileError } from "./errors";
import type { VersionControlHost } from "./host";
import { withTimeout } from "./lib/timeout";
import type { Logger } from "./logger";
import type { CommitRef } from "./types";

export interface ApplyOptions {
  message?: string;
  // The file must still hold exactly this text, else StaleFileError
  expectedContent?: string;
}

export interface ChangeApplierOptions {
  allowList: string[];
  commitTimeoutMs: number;
}

/**
 * Writes one documentation file to a pull request's branch as a single
 * commit. Only exact allow-list paths that already exist on the branch can
 * be written.
 */
export class ChangeApplier {
  constructor(
    private readonly host: VersionControlHost,
    private readonly options: ChangeApplierOptions,
    private readonly logger: Logger
  ) {}

  isAllowed(filePath: string): boolean {
    return this.options.allowList.includes(filePath);
  }

  async apply(
    pullRequestId: number,
    filePath: string,
    newContent: string,
    options: ApplyOptions = {}
  ): Promise<CommitRef> {
    if (!this.isAllowed(filePath)) {
      throw new ForbiddenFileError(filePath, this.options.allowList);
    }

    try {
      return await withTimeout(
        this.commit(pullRequestId, filePath, newContent, options),
        this.options.commitTimeoutMs,
        "Committing the change"
      );
    } catch (error) {
      if (error instanceof ApplyError) throw error;
      this.logger.error("Commit failed", { pullRequestId, filePath }, error);
      throw new ApplyError(error, {
        reply:
          error instanceof DocSyncError
            ? `${error.reply} The commit may still land on the branch; check it before re-issuing the command.`
            : undefined,
      });
    }
  }

  private async commit(
    pullRequestId: number,
    filePath: string,
    newContent: string,
    { message = `docs: update ${filePath}`, expectedContent }: ApplyOptions
  ): Promise<CommitRef> {
    const pr = await this.host.getPullRequest(pullRequestId);
    const current = await this.host.getFileContent(filePath, pr.headRef);
    if (!current) {
      throw new ForbiddenFileError(filePath, this.options.allowList, `does not exist on ${pr.headRef}`);
    }
    if (expectedContent !== undefined && current.content !== expectedContent) {
      this.logger.warn("File changed since the change was prepared", { pullRequestId, filePath });
      throw new StaleFileError(filePath, pr.headRef, current.content === newContent);
    }

    this.logger.info("Committing documentation change", {
      pullRequestId,
      filePath,
      branch: pr.headRef,
    });
    const { sha } = await this.host.commitFile({
      path: filePath,
      content: newContent,
      branch: pr.headRef,
      message,
      sha: current.sha,
    });

    return { sha, branch: pr.headRef, filePath, previousContent: current.content };
  }
}
