import type { ChangedFile, DocSyncSettings, PullRequestInfo } from "../types";

export interface FileContent {
  content: string;
  sha: string;
}

export interface CommitFileRequest {
  path: string;
  content: string;
  branch: string;
  message: string;
  sha?: string; // Blob sha of the file being replaced
}

export interface CreatePullRequestRequest {
  title: string;
  body: string;
  head: string;
  base: string;
}

/**
 * The version-control operations the bot needs, bound to one repository.
 * Pull request numbers double as comment thread ids.
 */
export interface VersionControlHost {
  readonly repository: string; // "owner/repo"
  getPullRequest(pullRequestId: number): Promise<PullRequestInfo>;
  getPullRequestDiff(pullRequestId: number): Promise<ChangedFile[]>;
  getFileContent(path: string, ref: string): Promise<FileContent | null>;
  commitFile(request: CommitFileRequest): Promise<{ sha: string }>;
  postComment(threadId: number, body: string): Promise<void>;
  createBranch(name: string, fromRef: string): Promise<void>;
  createPullRequest(request: CreatePullRequestRequest): Promise<{ number: number; url: string }>;
  addLabels(pullRequestId: number, labels: string[]): Promise<void>;
}

export function isDocSyncPullRequest(
  pr: Pick<PullRequestInfo, "title" | "labels">,
  origin: DocSyncSettings["origin"]
): boolean {
  return pr.title.startsWith(origin.titleMarker) || pr.labels.includes(origin.label);
}
