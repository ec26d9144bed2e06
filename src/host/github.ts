import { Octokit } from "@octokit/rest";
import type { ChangedFile, PullRequestInfo } from "../types";
import type {
  CommitFileRequest,
  CreatePullRequestRequest,
  FileContent,
  VersionControlHost,
} from "./index";

export function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "status" in error && error.status === 404;
}

function toChangeStatus(status: string): ChangedFile["status"] {
  switch (status) {
    case "added":
    case "removed":
    case "renamed":
      return status;
    default:
      return "modified";
  }
}

export class GitHubHost implements VersionControlHost {
  readonly repository: string;

  constructor(
    private readonly octokit: Octokit,
    private readonly owner: string,
    private readonly repo: string
  ) {
    this.repository = `${owner}/${repo}`;
  }

  async getPullRequest(pullRequestId: number): Promise<PullRequestInfo> {
    const { data: pr } = await this.octokit.pulls.get({
      owner: this.owner,
      repo: this.repo,
      pull_number: pullRequestId,
    });

    return {
      number: pr.number,
      title: pr.title,
      labels: pr.labels.map((label) => label.name),
      headRef: pr.head.ref,
      baseRef: pr.base.ref,
      state: pr.state === "open" ? "open" : "closed",
      merged: pr.merged,
      url: pr.html_url,
    };
  }

  async getPullRequestDiff(pullRequestId: number): Promise<ChangedFile[]> {
    const files = await this.octokit.paginate(this.octokit.pulls.listFiles, {
      owner: this.owner,
      repo: this.repo,
      pull_number: pullRequestId,
      per_page: 100,
    });

    return files.map((file) => ({
      filename: file.filename,
      status: toChangeStatus(file.status),
      patch: file.patch ?? "",
    }));
  }

  async getFileContent(path: string, ref: string): Promise<FileContent | null> {
    try {
      const { data } = await this.octokit.repos.getContent({
        owner: this.owner,
        repo: this.repo,
        path,
        ref,
      });

      if (Array.isArray(data) || data.type !== "file" || !("content" in data)) {
        return null;
      }
      return {
        content: Buffer.from(data.content, "base64").toString("utf-8"),
        sha: data.sha,
      };
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async commitFile(request: CommitFileRequest): Promise<{ sha: string }> {
    const { data } = await this.octokit.repos.createOrUpdateFileContents({
      owner: this.owner,
      repo: this.repo,
      path: request.path,
      message: request.message,
      content: Buffer.from(request.content, "utf-8").toString("base64"),
      branch: request.branch,
      ...(request.sha ? { sha: request.sha } : {}),
    });

    if (!data.commit.sha) {
      throw new Error(`GitHub did not return a commit for ${request.path}`);
    }
    return { sha: data.commit.sha };
  }

  async postComment(threadId: number, body: string): Promise<void> {
    await this.octokit.issues.createComment({
      owner: this.owner,
      repo: this.repo,
      issue_number: threadId,
      body,
    });
  }

  async createBranch(name: string, fromRef: string): Promise<void> {
    const { data: ref } = await this.octokit.git.getRef({
      owner: this.owner,
      repo: this.repo,
      ref: `heads/${fromRef}`,
    });

    await this.octokit.git.createRef({
      owner: this.owner,
      repo: this.repo,
      ref: `refs/heads/${name}`,
      sha: ref.object.sha,
    });
  }

  async createPullRequest(
    request: CreatePullRequestRequest
  ): Promise<{ number: number; url: string }> {
    const { data: pr } = await this.octokit.pulls.create({
      owner: this.owner,
      repo: this.repo,
      ...request,
    });
    return { number: pr.number, url: pr.html_url };
  }

  async addLabels(pullRequestId: number, labels: string[]): Promise<void> {
    if (labels.length === 0) return;
    await this.octokit.issues.addLabels({
      owner: this.owner,
      repo: this.repo,
      issue_number: pullRequestId,
      labels,
    });
  }
}

export function createGitHubHost(owner: string, repo: string, token: string): GitHubHost {
  return new GitHubHost(new Octokit({ auth: token }), owner, repo);
}
