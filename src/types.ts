export type LlmProvider = "openai" | "groq";

export interface DocSyncConfig {
  // Documentation files the bot may write (exact, case-sensitive paths)
  allowList?: string[];

  // Comment addressing
  botHandles?: string[]; // Mention handles without "@" (defaults to ['docbot', 'docsync'])
  legacyPrefix?: string; // Old-style prefix (defaults to 'docsync:')
  botLogin?: string; // Account the bot posts as; its own comments are ignored
  minFeedbackLength?: number;
  maxCommentLength?: number;

  // How DocSync pull requests are recognized
  docSyncLabel?: string;
  titleMarker?: string;

  // PR settings for the merge-triggered sync
  branchPrefix?: string;
  labels?: string[]; // Extra labels besides the DocSync label

  // LLM settings
  llmProvider?: LlmProvider;
  model?: string;
  temperature?: number;
  styleGuide?: string;

  // Limits
  generationTimeoutMs?: number;
  commitTimeoutMs?: number;

  // Session persistence
  sessionsDir?: string;
  lockStaleMs?: number;
}

export interface DocSyncSettings {
  allowList: string[];
  addressing: {
    botHandles: string[];
    legacyPrefix: string;
    botLogin?: string;
  };
  sanitizer: {
    minFeedbackLength: number;
    maxCommentLength: number;
  };
  origin: {
    label: string;
    titleMarker: string;
  };
  prConfig: {
    branchPrefix: string;
    titleTemplate: string;
    bodyTemplate: string;
    labels: string[];
  };
  llmConfig: {
    provider: LlmProvider;
    model: string;
    temperature: number;
    styleGuide?: string;
  };
  timeouts: {
    generationMs: number;
    commitMs: number;
  };
  storage: {
    sessionsDir: string;
    lockStaleMs: number;
  };
}

export type RefinementAction =
  | "update"
  | "clarify"
  | "add_example"
  | "expand"
  | "fix"
  | "freeform";

export type ControlAction = "approve" | "reject" | "revert";

export type ActionKind = RefinementAction | ControlAction;

export interface RefinementCommand {
  actionKind: RefinementAction;
  target: string;
  rawText: string;
}

export interface ControlCommand {
  actionKind: ControlAction;
  target: string;
  rawText: string;
}

export type Command = RefinementCommand | ControlCommand;

export interface SanitizedText {
  body: string; // Trimmed comment, line breaks preserved
  commandLine: string; // Same text on a single line
}

export type ApprovalState = "none" | "awaiting_approval" | "applied" | "discarded";

export interface PendingChange {
  filePath: string;
  content: string;
  baseContent: string;
  actionKind: RefinementAction;
  target: string;
  requestedBy: string;
  createdAt: string;
}

export interface HistoryEntry {
  readonly id: number;
  readonly kind: "apply" | "revert";
  readonly filePath: string;
  readonly previousContent: string;
  readonly newContent: string;
  readonly commitSha: string;
  readonly author: string;
  readonly appliedAt: string;
  readonly revertsEntryId?: number;
}

export interface Session {
  key: string;
  repository: string;
  pullRequestId: number;
  pendingChange?: PendingChange;
  history: HistoryEntry[];
  approvalState: ApprovalState;
  closed: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface PullRequestInfo {
  number: number;
  title: string;
  labels: string[];
  headRef: string;
  baseRef: string;
  state: "open" | "closed";
  merged: boolean;
  url: string;
}

export interface ChangedFile {
  filename: string;
  status: "added" | "modified" | "removed" | "renamed";
  patch: string;
}

export interface DiffSummary {
  title: string;
  baseRef: string;
  files: ChangedFile[];
}

export interface CodeChange {
  file: string;
  type: ChangedFile["status"];
  significance: {
    hasExports: boolean;
    hasInterfaces: boolean;
    hasClasses: boolean;
    hasTypes: boolean;
    hasEnums: boolean;
    isTest: boolean;
    isDocumentation: boolean;
  };
}

export interface SignificanceVerdict {
  significant: boolean;
  reason: string;
  changes: CodeChange[];
}

export interface CommitRef {
  sha: string;
  branch: string;
  filePath: string;
  previousContent: string;
}

export interface NewPullRequestRef {
  number: number;
  url: string;
  branch: string;
}
