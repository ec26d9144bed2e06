import { HeuristicClassifier } from "./classifier";
import type { SignificanceClassifier } from "./classifier";
import { ApplyError, GenerationError } from "./errors";
import { isDocSyncPullRequest } from "./host";
import type { VersionControlHost } from "./host";
import { KeyedMutex } from "./lib/keyedMutex";
import { withTimeout } from "./lib/timeout";
import { matchTrailingNewline } from "./llm";
import type { ContentGenerator } from "./llm";
import type { Logger } from "./logger";
import { NoopNotifier, notifyInBackground } from "./notify";
import type { Notifier } from "./notify";
import type { DiffSummary, DocSyncSettings, NewPullRequestRef } from "./types";

// Shared by every SyncFlow in the process so that one repository never has
// two syncs running at once
const repositoryLocks = new KeyedMutex();

export interface SyncFlowOptions {
  host: VersionControlHost;
  generator: ContentGenerator;
  settings: DocSyncSettings;
  logger: Logger;
  classifier?: SignificanceClassifier;
  notifier?: Notifier;
  locks?: KeyedMutex;
  now?: () => Date;
}

interface FileUpdate {
  path: string;
  content: string;
  sha: string;
}

export class SyncFlow {
  private readonly classifier: SignificanceClassifier;
  private readonly notifier: Notifier;
  private readonly locks: KeyedMutex;
  private readonly now: () => Date;

  constructor(private readonly options: SyncFlowOptions) {
    this.classifier = options.classifier ?? new HeuristicClassifier();
    this.notifier = options.notifier ?? new NoopNotifier();
    this.locks = options.locks ?? repositoryLocks;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Opens a documentation pull request for a merged pull request when its
   * changes are significant. Merges for the same repository queue up behind
   * each other.
   */
  handleMergeEvent(pullRequestId: number, diffSummary: DiffSummary): Promise<NewPullRequestRef | null> {
    return this.locks.runExclusive(this.options.host.repository, () =>
      this.sync(pullRequestId, diffSummary)
    );
  }

  private async sync(pullRequestId: number, diffSummary: DiffSummary): Promise<NewPullRequestRef | null> {
    const { host, settings } = this.options;
    const logger = this.options.logger.child(`${host.repository}#${pullRequestId}`);

    const merged = await host.getPullRequest(pullRequestId);
    if (isDocSyncPullRequest(merged, settings.origin)) {
      logger.info("Skipping DocSync pull request");
      return null;
    }

    const verdict = await this.classifier.classify(diffSummary);
    logger.info("Classified merge", { significant: verdict.significant, reason: verdict.reason });
    if (!verdict.significant) {
      return null;
    }

    const updates = await this.generateUpdates(pullRequestId, diffSummary, logger);
    if (updates.length === 0) {
      logger.info("Generated documentation matches the current files, no PR needed");
      return null;
    }

    const branch = `${settings.prConfig.branchPrefix}-${pullRequestId}-${this.now().getTime()}`;
    let pr: { number: number; url: string };
    try {
      logger.info("Creating branch", { branch, from: diffSummary.baseRef });
      await withTimeout(host.createBranch(branch, diffSummary.baseRef), settings.timeouts.commitMs, "Creating the branch");

      for (const update of updates) {
        await withTimeout(
          host.commitFile({
            path: update.path,
            content: update.content,
            branch,
            message: `docs: sync ${update.path} with #${pullRequestId}`,
            sha: update.sha,
          }),
          settings.timeouts.commitMs,
          `Committing ${update.path}`
        );
        logger.info("Committed", { path: update.path });
      }

      pr = await host.createPullRequest({
        title: settings.prConfig.titleTemplate.replace("{prTitle}", diffSummary.title),
        body: settings.prConfig.bodyTemplate
          .replace("{prNumber}", pullRequestId.toString())
          .replace(
            "{changes}",
            [`- ${verdict.reason}`, ...updates.map((update) => `- Updated \`${update.path}\``)].join("\n")
          ),
        head: branch,
        base: diffSummary.baseRef,
      });
      await host.addLabels(pr.number, settings.prConfig.labels);
    } catch (error) {
      logger.error("Sync failed while writing to the repository", { branch }, error);
      throw new ApplyError(error);
    }

    logger.info("Pull request created", { number: pr.number, url: pr.url });
    try {
      await host.postComment(pullRequestId, `📚 I've opened a documentation update PR: #${pr.number}`);
    } catch (error) {
      logger.warn("Could not comment on the merged pull request", {}, error);
    }
    notifyInBackground(
      this.notifier,
      `📚 DocSync opened ${host.repository}#${pr.number} for changes merged in #${pullRequestId}: ${pr.url}`,
      logger
    );

    return { number: pr.number, url: pr.url, branch };
  }

  private async generateUpdates(
    pullRequestId: number,
    diffSummary: DiffSummary,
    logger: Logger
  ): Promise<FileUpdate[]> {
    const { host, generator, settings } = this.options;
    const updates: FileUpdate[] = [];

    for (const path of settings.allowList) {
      const current = await host.getFileContent(path, diffSummary.baseRef);
      if (!current) {
        logger.debug("Not present on base branch, skipping", { path });
        continue;
      }

      let generated: string;
      try {
        generated = await withTimeout(
          generator.generate(
            {
              filePath: path,
              currentContent: current.content,
              pullRequest: { number: pullRequestId, title: diffSummary.title },
              diff: diffSummary.files,
              styleGuide: settings.llmConfig.styleGuide,
            },
            `Update ${path} so that it reflects the changes merged in pull request #${pullRequestId}. Leave sections the changes do not affect untouched.`
          ),
          settings.timeouts.generationMs,
          `Generating ${path}`
        );
      } catch (error) {
        throw new GenerationError(error);
      }

      const content = matchTrailingNewline(generated, current.content);
      if (content === current.content) {
        logger.debug("No changes generated", { path });
        continue;
      }
      updates.push({ path, content, sha: current.sha });
    }

    return updates;
  }
}
