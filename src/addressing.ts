import type { DocSyncSettings } from "./types";

export type Addressing = DocSyncSettings["addressing"];

export type Address =
  | { form: "structured"; handle: string; remainder: string }
  | { form: "legacy"; remainder: string };

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

function mentionPattern(handles: string[]): RegExp {
  // "@docbot" must end at whitespace, punctuation or the end of the line so
  // that "@docbotter" is not treated as a mention
  return new RegExp(`(^|\\s)@(${handles.map(escapeRegExp).join("|")})(?=$|[\\s,:;.!?])`, "i");
}

const stripLeadingPunctuation = (value: string): string => value.replace(/^[\s,:;]+/, "").trim();

function structuredFrom(line: string, pattern: RegExp): Extract<Address, { form: "structured" }> | null {
  const match = pattern.exec(line);
  if (!match) return null;
  const end = match.index + match[0].length;
  return {
    form: "structured",
    handle: match[2].toLowerCase(),
    remainder: stripLeadingPunctuation(line.slice(end)),
  };
}

/**
 * Works out whether a single-line comment is addressed to the bot and, if
 * so, what follows the address. When a legacy-prefixed comment also
 * mentions a handle, the structured mention wins.
 */
export function detectAddress(commandLine: string, addressing: Addressing): Address | null {
  const line = commandLine.trim();
  const pattern = mentionPattern(addressing.botHandles);

  if (line.startsWith("@")) {
    const structured = structuredFrom(line, pattern);
    if (structured && line.toLowerCase().startsWith(`@${structured.handle}`)) {
      return structured;
    }
    return null;
  }

  if (addressing.legacyPrefix && line.toLowerCase().startsWith(addressing.legacyPrefix)) {
    const structured = structuredFrom(line, pattern);
    if (structured) return structured;
    return { form: "legacy", remainder: line.slice(addressing.legacyPrefix.length).trim() };
  }

  return null;
}

export function isAddressedToBot(comment: string, addressing: Addressing): boolean {
  return detectAddress(comment.replace(/\s+/g, " "), addressing) !== null;
}
