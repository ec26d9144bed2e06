import { detectAddress } from "./addressing";
import type { Addressing } from "./addressing";
import { SanitizationRejection } from "./errors";
import type { BlockedCategory } from "./errors";
import type { DocSyncSettings, SanitizedText } from "./types";

// Plain substring matches, checked in this order; the first category with a
// hit is reported
export const BLOCKED_PATTERNS: Readonly<Record<BlockedCategory, readonly string[]>> = {
  credentials: ["secret", "token", "password", "api_key", "credential", ".env", "private_key", "ssh"],
  non_documentation_file: [".yml", ".yaml", ".json", ".js", ".ts", ".py", "package.json"],
  infrastructure: ["workflow", "action", "database", "sql"],
  version_control: ["commit", "push", "merge", "delete"],
};

const CATEGORY_ORDER: BlockedCategory[] = [
  "credentials",
  "non_documentation_file",
  "infrastructure",
  "version_control",
];

// These carry no feedback, so the minimum length does not apply to them
export const CONTROL_VERBS: readonly string[] = ["approve", "reject", "revert"];

export type SanitizerOptions = DocSyncSettings["sanitizer"] & { addressing: Addressing };

export type SanitizeResult =
  | { ok: true; value: SanitizedText }
  | { ok: false; rejection: SanitizationRejection };

export function findBlockedPatterns(
  text: string
): { category: BlockedCategory; patterns: string[] } | null {
  const lower = text.toLowerCase();
  for (const category of CATEGORY_ORDER) {
    const patterns = BLOCKED_PATTERNS[category].filter((pattern) => lower.includes(pattern));
    if (patterns.length > 0) {
      return { category, patterns };
    }
  }
  return null;
}

export function feedbackPayload(commandLine: string, addressing: Addressing): string {
  const address = detectAddress(commandLine, addressing);
  return address ? address.remainder : commandLine;
}

export function sanitize(rawComment: string, options: SanitizerOptions): SanitizeResult {
  const body = rawComment.trim();
  const commandLine = body.replace(/\s+/g, " ");

  if (body.length > options.maxCommentLength) {
    return {
      ok: false,
      rejection: new SanitizationRejection({
        kind: "too_long",
        length: body.length,
        maximum: options.maxCommentLength,
      }),
    };
  }

  const blocked = findBlockedPatterns(body);
  if (blocked) {
    return {
      ok: false,
      rejection: new SanitizationRejection({ kind: "blocked_pattern", ...blocked }),
    };
  }

  const payload = feedbackPayload(commandLine, options.addressing);
  const firstWord = payload.split(" ")[0]?.toLowerCase().replace(/[.!,:;]+$/, "") ?? "";
  if (!CONTROL_VERBS.includes(firstWord) && payload.length < options.minFeedbackLength) {
    return {
      ok: false,
      rejection: new SanitizationRejection({
        kind: "too_short",
        length: payload.length,
        minimum: options.minFeedbackLength,
      }),
    };
  }

  return { ok: true, value: { body, commandLine } };
}
