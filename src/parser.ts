import { detectAddress } from "./addressing";
import type { Addressing } from "./addressing";
import type { ActionKind, Command, SanitizedText } from "./types";

export const ACTION_KEYWORDS = {
  update: "update",
  clarify: "clarify",
  add: "add_example",
  expand: "expand",
  fix: "fix",
  approve: "approve",
  reject: "reject",
  revert: "revert",
} as const satisfies Record<string, ActionKind>;

type Keyword = keyof typeof ACTION_KEYWORDS;

const isKeyword = (word: string): word is Keyword => Object.hasOwn(ACTION_KEYWORDS, word);

export type ParseResult =
  | { ok: true; command: Command }
  | { ok: false; rejection: "not_a_command" };

const NOT_A_COMMAND: ParseResult = { ok: false, rejection: "not_a_command" };

function commandFromKeyword(keyword: Keyword, rest: string, rawText: string): Command {
  const actionKind = ACTION_KEYWORDS[keyword];
  // "@docbot add example for login" -> target "for login"
  const target = actionKind === "add_example" ? rest.replace(/^examples?\b:?\s*/i, "") : rest;
  return { actionKind, target, rawText };
}

export function parseCommand(sanitized: SanitizedText, addressing: Addressing): ParseResult {
  const address = detectAddress(sanitized.commandLine, addressing);
  if (!address) {
    return NOT_A_COMMAND;
  }

  const rawText = sanitized.body;
  const remainder = address.remainder;
  if (remainder.length === 0) {
    return NOT_A_COMMAND;
  }

  if (address.form === "legacy") {
    return { ok: true, command: { actionKind: "freeform", target: remainder, rawText } };
  }

  const [first = "", ...rest] = remainder.split(" ");
  const keyword = first.toLowerCase().replace(/[.!,:;]+$/, "");
  if (isKeyword(keyword)) {
    return { ok: true, command: commandFromKeyword(keyword, rest.join(" ").trim(), rawText) };
  }

  return { ok: true, command: { actionKind: "freeform", target: remainder, rawText } };
}
