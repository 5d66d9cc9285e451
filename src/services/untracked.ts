import type { DiffFile, DiffLine } from "../types/diff.js";

/**
 * Build an "every line added" diff for a file git doesn't track yet.
 *
 * A trailing newline ends the last line rather than starting an empty one,
 * so a five-line file yields five added lines.
 */
export function buildUntrackedFileDiff(path: string, content: string): DiffFile {
  if (content.includes("\0")) {
    return {
      path,
      oldPath: path,
      status: "added",
      isBinary: true,
      additions: 0,
      deletions: 0,
      hunks: [],
    };
  }

  const lines = splitContentLines(content);
  const diffLines = lines.map((line, index): DiffLine => ({
    type: "add",
    content: line,
    newLineNumber: index + 1,
  }));

  return {
    path,
    oldPath: path,
    status: "added",
    isBinary: false,
    additions: lines.length,
    deletions: 0,
    hunks: [
      {
        oldStart: 0,
        oldLines: 0,
        newStart: 1,
        newLines: lines.length,
        header: `@@ -0,0 +1,${lines.length} @@`,
        lines: diffLines,
      },
    ],
  };
}

function splitContentLines(content: string): string[] {
  if (content === "") {
    return [];
  }
  const lines = content.split("\n");
  if (content.endsWith("\n")) {
    lines.pop();
  }
  return lines;
}
