import type {
  ParsedDiff,
  DiffFile,
  DiffHunk,
  DiffLine,
  DiffFileStatus,
} from "../types/diff.js";

const FILE_MARKER = "diff --git";
const HUNK_MARKER = "@@";

/** The numbers and trailing text of an `@@ -a,b +c,d @@` header */
export interface HunkHeader {
  oldStart: number;
  oldLines: number;
  newStart: number;
  newLines: number;
  /** Whatever follows the closing @@ (usually the enclosing function) */
  section: string;
}

/**
 * Parse a raw unified diff string into structured data.
 *
 * Never throws: file sections or hunks that can't be interpreted are skipped
 * and the scan carries on with the rest of the text.
 */
export function parseDiff(rawDiff: string): ParsedDiff {
  if (!rawDiff || rawDiff.trim().length === 0) {
    return { files: [] };
  }

  const files: DiffFile[] = [];
  const lines = rawDiff.split("\n");

  let i = 0;
  while (i < lines.length) {
    const line = lines[i];
    if (line?.startsWith(FILE_MARKER)) {
      const { file, nextIndex } = parseFile(lines, i);
      files.push(file);
      i = nextIndex;
    } else {
      i++;
    }
  }

  return { files };
}

/**
 * Parse a single file's section starting at its `diff --git` line.
 * Returns the index of the next file marker (or the end of input).
 */
function parseFile(
  lines: string[],
  startIndex: number
): { file: DiffFile; nextIndex: number } {
  const paths = parseGitDiffLine(lines[startIndex] ?? "");
  let oldPath = paths.oldPath;
  let status: DiffFileStatus | undefined;
  let isBinary = false;
  const hunks: DiffHunk[] = [];

  let i = startIndex + 1;
  while (i < lines.length) {
    const line = lines[i] ?? "";
    if (line.startsWith(FILE_MARKER)) {
      break;
    }

    if (line.startsWith(HUNK_MARKER)) {
      const parsed = parseHunk(lines, i);
      if (parsed.hunk) {
        hunks.push(parsed.hunk);
      }
      i = parsed.nextIndex;
      continue;
    }

    if (line.startsWith("new file")) {
      status = "added";
    } else if (line.startsWith("deleted file")) {
      status = "deleted";
    } else if (line.startsWith("rename from ")) {
      status = "renamed";
      oldPath = unquoteGitPath(line.slice("rename from ".length));
    } else if (line.startsWith("Binary files") || line === "GIT binary patch") {
      isBinary = true;
    }
    // index, ---/+++, mode and similarity lines carry nothing we keep

    i++;
  }

  const fileHunks = isBinary ? [] : hunks;
  const { additions, deletions } = countChanges(fileHunks);

  return {
    file: {
      path: paths.path,
      oldPath,
      status: status ?? "modified",
      isBinary,
      additions,
      deletions,
      hunks: fileHunks,
    },
    nextIndex: i,
  };
}

/**
 * Parse the "diff --git a/path b/path" line.
 *
 * Any single-letter prefix is accepted, since `diff.mnemonicPrefix` makes git
 * print c/, i/, w/ and friends instead of a/ and b/. Either path may be
 * C-quoted when it holds bytes git won't print raw.
 */
function parseGitDiffLine(line: string): { path: string; oldPath: string } {
  const quoted = line.includes('"')
    ? line.match(/^diff --git ("(?:[^"\\]|\\.)*"|[^"].*?) ("(?:[^"\\]|\\.)*"|[^"].*?)\r?$/)
    : null;
  const match = quoted ?? line.match(/^diff --git ([a-z]\/.+) ([a-z]\/.+?)\r?$/);
  const oldPath = stripPrefix(unquoteGitPath(match?.[1] ?? ""));
  const newPath = stripPrefix(unquoteGitPath(match?.[2] ?? ""));
  if (oldPath === undefined || newPath === undefined) {
    return { path: "", oldPath: "" };
  }
  return { path: newPath, oldPath };
}

function stripPrefix(path: string): string | undefined {
  return /^[a-z]\//.test(path) ? path.slice(2) : undefined;
}

const QUOTE_ESCAPES: Record<string, number> = {
  a: 0x07,
  b: 0x08,
  t: 0x09,
  n: 0x0a,
  v: 0x0b,
  f: 0x0c,
  r: 0x0d,
  '"': 0x22,
  "\\": 0x5c,
};

/**
 * Decode a path git wrapped in double quotes (`"caf\303\251.txt"`).
 * Octal escapes are UTF-8 bytes. Unquoted paths come back unchanged.
 */
export function unquoteGitPath(value: string): string {
  if (value.length < 2 || !value.startsWith('"') || !value.endsWith('"')) {
    return value;
  }

  const body = value.slice(1, -1);
  const encoder = new TextEncoder();
  const bytes: number[] = [];

  let i = 0;
  while (i < body.length) {
    const codePoint = body.codePointAt(i) ?? 0;
    if (body[i] !== "\\") {
      const char = String.fromCodePoint(codePoint);
      bytes.push(...encoder.encode(char));
      i += char.length;
      continue;
    }

    const octal = body.slice(i + 1, i + 4);
    if (/^[0-7]{3}$/.test(octal)) {
      bytes.push(parseInt(octal, 8));
      i += 4;
      continue;
    }

    const escaped = QUOTE_ESCAPES[body[i + 1] ?? ""];
    if (escaped === undefined) {
      // Unknown escape: keep the backslash
      bytes.push(0x5c);
      i++;
      continue;
    }
    bytes.push(escaped);
    i += 2;
  }

  return new TextDecoder().decode(Uint8Array.from(bytes));
}

/**
 * Parse `@@ -oldStart[,oldLines] +newStart[,newLines] @@ section`.
 * Returns null when the line isn't a hunk header.
 */
export function parseHunkHeader(header: string): HunkHeader | null {
  const match = header.match(/^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@(.*)/);
  if (!match) {
    return null;
  }

  const [, oldStart, oldLines, newStart, newLines, section] = match;
  if (oldStart === undefined || newStart === undefined) {
    return null;
  }

  return {
    oldStart: parseInt(oldStart, 10),
    oldLines: parseCount(oldLines),
    newStart: parseInt(newStart, 10),
    newLines: parseCount(newLines),
    section: (section ?? "").trim(),
  };
}

/** A count left out of the header means a single line */
function parseCount(count: string | undefined): number {
  return count === undefined ? 1 : parseInt(count, 10);
}

/**
 * Parse a hunk starting at the @@ line.
 *
 * On a malformed header the hunk is dropped and the returned index points just
 * past the header, so the caller always moves forward.
 */
function parseHunk(
  lines: string[],
  startIndex: number
): { hunk: DiffHunk | null; nextIndex: number } {
  const headerLine = lines[startIndex] ?? "";
  const header = parseHunkHeader(headerLine);
  if (!header) {
    return { hunk: null, nextIndex: startIndex + 1 };
  }

  const hunkLines: DiffLine[] = [];
  let currentOldLine = header.oldStart;
  let currentNewLine = header.newStart;

  let i = startIndex + 1;
  while (i < lines.length) {
    const line = lines[i] ?? "";

    // Stop at next hunk or next file
    if (line.startsWith(HUNK_MARKER) || line.startsWith(FILE_MARKER)) {
      break;
    }
    i++;

    const content = line.slice(1);
    switch (line[0]) {
      case "+":
        hunkLines.push({ type: "add", content, newLineNumber: currentNewLine++ });
        break;
      case "-":
        hunkLines.push({ type: "delete", content, oldLineNumber: currentOldLine++ });
        break;
      case " ":
        hunkLines.push({
          type: "context",
          content,
          oldLineNumber: currentOldLine++,
          newLineNumber: currentNewLine++,
        });
        break;
      default:
        // Empty lines, "\ No newline at end of file" and anything unexpected
        break;
    }
  }

  return {
    hunk: {
      oldStart: header.oldStart,
      oldLines: header.oldLines,
      newStart: header.newStart,
      newLines: header.newLines,
      header: headerLine,
      lines: hunkLines,
    },
    nextIndex: i,
  };
}

/**
 * Tally added and deleted lines across hunks
 */
export function countChanges(hunks: DiffHunk[]): { additions: number; deletions: number } {
  let additions = 0;
  let deletions = 0;
  for (const hunk of hunks) {
    for (const line of hunk.lines) {
      if (line.type === "add") {
        additions++;
      } else if (line.type === "delete") {
        deletions++;
      }
    }
  }
  return { additions, deletions };
}
