/**
 * Line-level preview of a proposed change for the approval comment: the
 * unchanged head and tail are trimmed and the differing middle is shown as
 * removed/added lines.
 */
export interface DiffPreview {
  text: string;
  removed: number;
  added: number;
  truncated: boolean;
}

const MAX_PREVIEW_LINES = 60;
const CONTEXT_LINES = 2;

export function previewDiff(before: string, after: string): DiffPreview {
  const oldLines = before.split("\n");
  const newLines = after.split("\n");

  let prefix = 0;
  while (
    prefix < oldLines.length &&
    prefix < newLines.length &&
    oldLines[prefix] === newLines[prefix]
  ) {
    prefix++;
  }

  let suffix = 0;
  while (
    suffix < oldLines.length - prefix &&
    suffix < newLines.length - prefix &&
    oldLines[oldLines.length - 1 - suffix] === newLines[newLines.length - 1 - suffix]
  ) {
    suffix++;
  }

  const removedLines = oldLines.slice(prefix, oldLines.length - suffix);
  const addedLines = newLines.slice(prefix, newLines.length - suffix);
  const leading = oldLines.slice(Math.max(0, prefix - CONTEXT_LINES), prefix);
  const trailing = oldLines.slice(oldLines.length - suffix, oldLines.length - suffix + CONTEXT_LINES);

  const lines = [
    `@@ line ${prefix + 1} @@`,
    ...leading.map((line) => `  ${line}`),
    ...removedLines.map((line) => `- ${line}`),
    ...addedLines.map((line) => `+ ${line}`),
    ...trailing.map((line) => `  ${line}`),
  ];

  const truncated = lines.length > MAX_PREVIEW_LINES;
  const shown = truncated
    ? [...lines.slice(0, MAX_PREVIEW_LINES), `... (${lines.length - MAX_PREVIEW_LINES} more lines)`]
    : lines;

  return {
    text: shown.join("\n"),
    removed: removedLines.length,
    added: addedLines.length,
    truncated,
  };
}
