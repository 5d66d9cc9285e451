import { type } from "arktype";
import type { DiffFile } from "./diff.js";

/**
 * Which changes to diff:
 * - "staged" - index vs HEAD
 * - "unstaged" - working tree vs index (plus untracked files)
 * - "all" - working tree vs HEAD (plus untracked files)
 */
export const DiffKindSchema = type("'staged' | 'unstaged' | 'all'");
export type DiffKind = typeof DiffKindSchema.infer;

/** Context lines git uses when nothing else is asked for */
export const DEFAULT_CONTEXT_LINES = 3;

/** Large enough that every hunk spans the whole file */
export const FULL_CONTEXT_LINES = 999999;

/** An untracked file that could not be turned into a diff */
export interface UntrackedFileError {
  path: string;
  message: string;
}

/** Result of a diff operation */
export interface DiffResult {
  /** The kind that was requested */
  kind: DiffKind;
  /** Parsed tracked changes, followed by synthesized untracked files */
  files: DiffFile[];
  /** Untracked files that were skipped because they could not be read */
  untrackedErrors: UntrackedFileError[];
}

/** Errors specific to git operations */
export class GitError extends Error {
  constructor(
    message: string,
    public readonly code: GitErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "GitError";
  }
}

export type GitErrorCode =
  | "NOT_A_REPO"
  | "FILE_NOT_FOUND"
  | "FILE_NOT_IN_DIFF"
  | "GIT_ERROR";
