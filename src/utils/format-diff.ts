/**
 * Turn parsed diff structures back into unified diff text
 *
 * The output is what `parseDiff` reads: feeding it back in gives the same
 * files, hunks and lines. Things the parser throws away (index lines,
 * "\ No newline at end of file", mode bits) don't come back.
 */

import type { DiffFile, DiffHunk, DiffLine, ParsedDiff } from "../types/diff.js";

/**
 * The marker character a line type is written with
 */
export function linePrefix(line: DiffLine): string {
  switch (line.type) {
    case "add":
      return "+";
    case "delete":
      return "-";
    case "context":
      return " ";
  }
}

/**
 * Format just the body lines of a hunk, each with its +/-/space marker
 */
export function formatHunkBody(hunk: DiffHunk): string {
  return hunk.lines.map((line) => `${linePrefix(line)}${line.content}`).join("\n");
}

/**
 * Format a diff hunk with its header and lines.
 */
export function formatHunk(hunk: DiffHunk): string {
  if (hunk.lines.length === 0) {
    return hunk.header;
  }
  return `${hunk.header}\n${formatHunkBody(hunk)}`;
}

/**
 * Format a single file as a git-style diff section
 */
export function formatDiffFile(file: DiffFile): string {
  const lines: string[] = [`diff --git a/${file.oldPath} b/${file.path}`];

  switch (file.status) {
    case "added":
      lines.push("new file mode 100644");
      break;
    case "deleted":
      lines.push("deleted file mode 100644");
      break;
    case "renamed":
      lines.push(`rename from ${file.oldPath}`, `rename to ${file.path}`);
      break;
    case "modified":
      break;
  }

  // Binary files have no hunks
  if (file.isBinary) {
    lines.push(`Binary files a/${file.oldPath} and b/${file.path} differ`);
    return lines.join("\n");
  }

  if (file.hunks.length > 0) {
    lines.push(
      file.status === "added" ? "--- /dev/null" : `--- a/${file.oldPath}`,
      file.status === "deleted" ? "+++ /dev/null" : `+++ b/${file.path}`
    );
  }

  for (const hunk of file.hunks) {
    lines.push(formatHunk(hunk));
  }

  return lines.join("\n");
}

/**
 * Format a whole parsed diff, newline-terminated like git's own output
 */
export function formatDiff(diff: ParsedDiff): string {
  if (diff.files.length === 0) {
    return "";
  }
  return diff.files.map(formatDiffFile).join("\n") + "\n";
}
