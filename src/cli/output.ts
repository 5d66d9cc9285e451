/**
 * CLI Output Formatting - Formats parsed diffs for terminal display
 *
 * Two modes:
 * - Stat: one line per file with status and +/- counts
 * - Full: every hunk with old/new line numbers in the gutter
 *
 * Every formatter takes the color palette as its last argument so tests can
 * pass `pc.createColors(false)` and compare plain text.
 */

import pc from "picocolors";
import type { DiffFile, DiffFileStatus, DiffHunk, DiffLine } from "../types/diff.js";
import type { UntrackedFileError } from "../types/git.js";

export type Palette = ReturnType<typeof pc.createColors>;

const STATUS_LETTERS: Record<DiffFileStatus, string> = {
  added: "A",
  modified: "M",
  deleted: "D",
  renamed: "R",
};

/**
 * Color a file status letter appropriately
 */
function colorStatus(status: DiffFileStatus, colors: Palette): string {
  const letter = STATUS_LETTERS[status];
  switch (status) {
    case "added":
      return colors.green(letter);
    case "deleted":
      return colors.red(letter);
    case "renamed":
      return colors.cyan(letter);
    case "modified":
      return colors.yellow(letter);
  }
}

/**
 * Path shown for a file, with the old name for renames
 */
export function displayPath(file: DiffFile): string {
  if (file.status === "renamed" && file.oldPath !== file.path) {
    return `${file.oldPath} → ${file.path}`;
  }
  return file.path;
}

/**
 * One line per file: status letter, path, and change counts
 */
export function formatStatLine(file: DiffFile, colors: Palette = pc): string {
  const counts = file.isBinary
    ? colors.dim("binary")
    : `${colors.green(`+${file.additions}`)} ${colors.red(`-${file.deletions}`)}`;
  return `${colorStatus(file.status, colors)} ${displayPath(file)} ${counts}`;
}

/**
 * Stat view for a list of files, with a totals line at the end
 */
export function formatStat(files: DiffFile[], colors: Palette = pc): string {
  if (files.length === 0) {
    return colors.yellow("No changes found.");
  }

  let additions = 0;
  let deletions = 0;
  const lines = files.map((file) => {
    additions += file.additions;
    deletions += file.deletions;
    return formatStatLine(file, colors);
  });

  const noun = files.length === 1 ? "file" : "files";
  lines.push(
    colors.dim(`${files.length} ${noun} changed, ${additions} insertions(+), ${deletions} deletions(-)`)
  );
  return lines.join("\n");
}

/**
 * Old/new line number gutter, blank on the side a line doesn't exist on
 */
function gutter(line: DiffLine, width: number): string {
  const oldNumber = line.type === "add" ? "" : String(line.oldLineNumber);
  const newNumber = line.type === "delete" ? "" : String(line.newLineNumber);
  return `${oldNumber.padStart(width)} ${newNumber.padStart(width)}`;
}

/**
 * Format one hunk with its header and numbered lines
 */
export function formatHunkLines(hunk: DiffHunk, colors: Palette = pc): string {
  const lastOld = hunk.oldStart + hunk.oldLines;
  const lastNew = hunk.newStart + hunk.newLines;
  const width = Math.max(String(lastOld).length, String(lastNew).length);

  const lines: string[] = [colors.cyan(hunk.header)];
  for (const line of hunk.lines) {
    const numbers = colors.dim(gutter(line, width));
    switch (line.type) {
      case "add":
        lines.push(`${numbers} ${colors.green(`+${line.content}`)}`);
        break;
      case "delete":
        lines.push(`${numbers} ${colors.red(`-${line.content}`)}`);
        break;
      case "context":
        lines.push(`${numbers}  ${line.content}`);
        break;
    }
  }
  return lines.join("\n");
}

/**
 * Full view of one file: a bold header line, then every hunk
 */
export function formatFileDiff(file: DiffFile, colors: Palette = pc): string {
  const lines: string[] = [colors.bold(formatStatLine(file, colors))];

  if (file.isBinary) {
    lines.push(colors.dim("[binary file]"));
    return lines.join("\n");
  }

  for (const hunk of file.hunks) {
    lines.push(formatHunkLines(hunk, colors));
  }
  return lines.join("\n");
}

/**
 * Warnings for untracked files that were skipped
 */
export function formatUntrackedErrors(
  errors: UntrackedFileError[],
  colors: Palette = pc
): string {
  return errors.map((error) => colors.yellow(`Warning: ${error.message}`)).join("\n");
}
