import { resolve } from "node:path";
import simpleGit, { type SimpleGit } from "simple-git";
import { parseDiff } from "./diff-parser.js";
import { buildUntrackedFileDiff } from "./untracked.js";
import { readTextFile } from "../runtime/index.js";
import type { DiffFile } from "../types/diff.js";
import {
  DEFAULT_CONTEXT_LINES,
  FULL_CONTEXT_LINES,
  GitError,
  type DiffKind,
  type DiffResult,
  type UntrackedFileError,
} from "../types/git.js";

export interface GetDiffOptions {
  /** Unchanged lines around each hunk (default 3) */
  contextLines?: number;
  /** Append synthesized diffs for untracked files (default true) */
  includeUntracked?: boolean;
  /** Working directory (defaults to process.cwd()) */
  cwd?: string;
}

const DIFF_KIND_ARGS: Record<DiffKind, string[]> = {
  staged: ["--cached"],
  unstaged: [],
  all: ["HEAD"],
};

/**
 * Build the `git diff` arguments for a kind of diff
 */
export function diffArgs(kind: DiffKind, contextLines: number = DEFAULT_CONTEXT_LINES): string[] {
  const args = [...DIFF_KIND_ARGS[kind], "--no-color", "--no-ext-diff"];

  // Negative means "whatever git defaults to"
  if (contextLines >= 0) {
    args.push(`-U${contextLines}`);
  }
  return args;
}

/**
 * Turn `git status --porcelain -z` output into paths.
 * Every entry starts with a two-letter status code and a space. A rename or
 * copy entry is followed by a second entry holding its source path.
 */
export function parseStatusOutput(output: string): string[] {
  const entries = output.split("\0");
  const paths: string[] = [];

  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i] ?? "";
    if (entry.length <= 3) {
      continue;
    }
    paths.push(entry.slice(3));
    if (/[RC]/.test(entry.slice(0, 2))) {
      i++;
    }
  }
  return paths;
}

/**
 * Split NUL-separated command output, dropping empty entries
 */
function splitPaths(output: string): string[] {
  return output.split("\0").filter((path) => path.length > 0);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Initialize git instance and verify we're in a repo.
 * Paths are printed raw, so non-ASCII names aren't C-quoted.
 */
async function getGit(cwd?: string): Promise<SimpleGit> {
  const git = simpleGit({
    baseDir: cwd ?? process.cwd(),
    config: ["core.quotePath=false"],
  });

  let isRepo: boolean;
  try {
    isRepo = await git.checkIsRepo();
  } catch (err) {
    throw new GitError(errorMessage(err), "GIT_ERROR", { cause: err });
  }
  if (!isRepo) {
    throw new GitError("Not a git repository", "NOT_A_REPO");
  }

  return git;
}

/**
 * Absolute path of the working tree root; every path git reports is relative to it
 */
async function getRepoRoot(git: SimpleGit): Promise<string> {
  try {
    return (await git.revparse(["--show-toplevel"])).trim();
  } catch (err) {
    throw new GitError(
      `Failed to find repository root: ${errorMessage(err)}`,
      "GIT_ERROR",
      { cause: err }
    );
  }
}

/**
 * Get the raw unified diff text for a kind of change
 *
 * @param kind - "staged", "unstaged" or "all" (working tree vs HEAD)
 * @param contextLines - unchanged lines around each hunk; a huge value gives whole files
 */
export async function getRawDiff(
  kind: DiffKind,
  contextLines: number = DEFAULT_CONTEXT_LINES,
  cwd?: string
): Promise<string> {
  const git = await getGit(cwd);
  try {
    return await git.diff(diffArgs(kind, contextLines));
  } catch (err) {
    throw new GitError(`Failed to get diff: ${errorMessage(err)}`, "GIT_ERROR", { cause: err });
  }
}

/**
 * List files git doesn't track and doesn't ignore, across the whole
 * repository and relative to its root
 */
export async function getUntrackedFiles(cwd?: string): Promise<string[]> {
  const git = await getGit(cwd);
  try {
    const output = await git.raw([
      "ls-files",
      "-z",
      "--others",
      "--exclude-standard",
      "--full-name",
      "--",
      ":/",
    ]);
    return splitPaths(output);
  } catch (err) {
    throw new GitError(
      `Failed to list untracked files: ${errorMessage(err)}`,
      "GIT_ERROR",
      { cause: err }
    );
  }
}

/**
 * Read an untracked file and synthesize its diff
 */
async function getUntrackedFileDiff(path: string, root: string): Promise<DiffFile> {
  const content = await readTextFile(resolve(root, path));
  return buildUntrackedFileDiff(path, content);
}

/**
 * Get the parsed diff for a kind of change.
 *
 * For "unstaged" and "all", untracked files are appended as new files.
 * An untracked file that can't be read is listed in `untrackedErrors`
 * and the rest are still returned.
 */
export async function getDiff(
  kind: DiffKind = "all",
  options: GetDiffOptions = {}
): Promise<DiffResult> {
  const { contextLines = DEFAULT_CONTEXT_LINES, includeUntracked = true, cwd } = options;

  const raw = await getRawDiff(kind, contextLines, cwd);
  const { files } = parseDiff(raw);
  const untrackedErrors: UntrackedFileError[] = [];

  if (includeUntracked && kind !== "staged") {
    const untracked = await getUntrackedFiles(cwd);
    const root = await getRepoRoot(await getGit(cwd));
    for (const path of untracked) {
      try {
        files.push(await getUntrackedFileDiff(path, root));
      } catch (err) {
        untrackedErrors.push({
          path,
          message: `Failed to read untracked file ${path}: ${errorMessage(err)}`,
        });
      }
    }
  }

  return { kind, files, untrackedErrors };
}

/**
 * List changed paths from `git status --porcelain`, relative to the repository root
 */
export async function getStatus(cwd?: string): Promise<string[]> {
  const git = await getGit(cwd);
  try {
    return parseStatusOutput(await git.raw(["status", "--porcelain", "-z"]));
  } catch (err) {
    throw new GitError(`Failed to get status: ${errorMessage(err)}`, "GIT_ERROR", { cause: err });
  }
}

/**
 * Get a file's content as of HEAD, or from disk if HEAD doesn't have it.
 * `path` is relative to the repository root.
 */
export async function getFileContent(path: string, cwd?: string): Promise<string> {
  const git = await getGit(cwd);
  // Not committed yet means we fall through to the working tree
  const committed = await git.show([`HEAD:${path}`]).catch(() => null);
  if (committed !== null) {
    return committed;
  }

  const root = await getRepoRoot(git);
  try {
    return await readTextFile(resolve(root, path));
  } catch (err) {
    throw new GitError(`Failed to read file: ${errorMessage(err)}`, "FILE_NOT_FOUND", {
      cause: err,
    });
  }
}

/**
 * Get the diff of a single file, given relative to the repository root.
 * Untracked files are synthesized without running `git diff` at all.
 */
export async function getFileDiff(
  path: string,
  kind: DiffKind = "all",
  contextLines: number = DEFAULT_CONTEXT_LINES,
  cwd?: string
): Promise<DiffFile> {
  const untracked = await getUntrackedFiles(cwd);
  if (untracked.includes(path)) {
    const root = await getRepoRoot(await getGit(cwd));
    try {
      return await getUntrackedFileDiff(path, root);
    } catch (err) {
      throw new GitError(
        `Failed to read untracked file ${path}: ${errorMessage(err)}`,
        "FILE_NOT_FOUND",
        { cause: err }
      );
    }
  }

  const { files } = await getDiff(kind, { contextLines, includeUntracked: false, cwd });
  const file = files.find((f) => f.path === path);
  if (!file) {
    throw new GitError(`File not found in diff: ${path}`, "FILE_NOT_IN_DIFF");
  }
  return file;
}

/**
 * Get a single file's diff with the whole file as context
 */
export async function getFileDiffWithFullContext(
  path: string,
  kind: DiffKind = "all",
  cwd?: string
): Promise<DiffFile> {
  return getFileDiff(path, kind, FULL_CONTEXT_LINES, cwd);
}
