/** Status of a file in the diff */
export type DiffFileStatus = "added" | "modified" | "deleted" | "renamed";

/** An unchanged line, present on both sides */
export interface ContextLine {
  type: "context";
  /** The line content (without the leading space) */
  content: string;
  oldLineNumber: number;
  newLineNumber: number;
}

/** A line that only exists in the new file */
export interface AddedLine {
  type: "add";
  /** The line content (without the leading +) */
  content: string;
  newLineNumber: number;
}

/** A line that only exists in the old file */
export interface DeletedLine {
  type: "delete";
  /** The line content (without the leading -) */
  content: string;
  oldLineNumber: number;
}

/**
 * A single line in a diff hunk.
 *
 * Each variant carries only the line numbers that exist for it, so an added
 * line can never have an old line number and a deleted line never a new one.
 */
export type DiffLine = ContextLine | AddedLine | DeletedLine;

/** A hunk represents a contiguous block of changes */
export interface DiffHunk {
  /** Starting line in old file */
  oldStart: number;
  /** Number of lines from old file (1 when the header omits it) */
  oldLines: number;
  /** Starting line in new file */
  newStart: number;
  /** Number of lines in new file (1 when the header omits it) */
  newLines: number;
  /** The raw @@ header line */
  header: string;
  /** The lines in this hunk */
  lines: DiffLine[];
}

/** A file that has changes */
export interface DiffFile {
  /** Current path of the file */
  path: string;
  /** Previous path; same as `path` unless the file was renamed */
  oldPath: string;
  /** What happened to this file */
  status: DiffFileStatus;
  /** True if this is a binary file */
  isBinary: boolean;
  /** Number of added lines across all hunks */
  additions: number;
  /** Number of deleted lines across all hunks */
  deletions: number;
  /** The hunks of changes (empty for binary files) */
  hunks: DiffHunk[];
}

/** The result of parsing a diff */
export interface ParsedDiff {
  files: DiffFile[];
}
