import { Command } from "commander";
import pc from "picocolors";
import { getDiff, getFileDiff } from "../services/git.js";
import { parseDiff } from "../services/diff-parser.js";
import { loadConfig } from "../services/config.js";
import { readStdin, readTextFile } from "../runtime/index.js";
import type { DiffFile } from "../types/diff.js";
import { FULL_CONTEXT_LINES, type DiffKind } from "../types/git.js";
import type { ResolvedConfig } from "../types/config.js";
import { formatDiff } from "../utils/format-diff.js";
import { formatFileDiff, formatStat, formatUntrackedErrors } from "./output.js";
import { exitWithError, parseContextLines, parseKind, progress } from "./options.js";
import { createShowCommand, createStatusCommand } from "./repo.js";

export interface DiffOptions {
  context?: number;
  full: boolean;
  untracked: boolean;
  stat: boolean;
  json: boolean;
}

export interface ParseOptions {
  stat: boolean;
  patch: boolean;
  json: boolean;
}

/**
 * Context lines to ask git for: --full wins, then -U, then config
 */
function resolveContextLines(
  options: { context?: number; full: boolean },
  config: ResolvedConfig
): number {
  if (options.full) {
    return FULL_CONTEXT_LINES;
  }
  return options.context ?? config.contextLines;
}

/**
 * Print files as a stat list or as full hunks
 */
function outputFiles(files: DiffFile[], stat: boolean): void {
  if (stat || files.length === 0) {
    console.log(formatStat(files));
    return;
  }
  console.log(files.map((file) => formatFileDiff(file)).join("\n\n"));
}

const program = new Command();

program
  .name("hunkview")
  .description("Structured, line-numbered views of git diffs")
  .version("0.1.0");

program
  .command("diff")
  .description("Show changed files with classified, numbered lines")
  .argument("[kind]", "What to diff: staged, unstaged, or all (vs HEAD)", parseKind)
  .option("-U, --context <lines>", "Unchanged lines around each hunk", parseContextLines)
  .option("--full", "Use the whole file as context", false)
  .option("--no-untracked", "Leave out untracked files")
  .option("--stat", "Only list files with their change counts", false)
  .option("--json", "Output results as JSON", false)
  .action(async (kindArg: DiffKind | undefined, options: DiffOptions) => {
    try {
      const config = await loadConfig();
      const kind = kindArg ?? config.kind;
      const contextLines = resolveContextLines(options, config);

      progress(`Fetching ${kind} diff...`, options.json);
      const result = await getDiff(kind, {
        contextLines,
        includeUntracked: options.untracked && config.includeUntracked,
      });

      if (result.untrackedErrors.length > 0) {
        console.error(formatUntrackedErrors(result.untrackedErrors));
      }

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
        return;
      }
      outputFiles(result.files, options.stat);
    } catch (error) {
      exitWithError(error);
    }
  });

program
  .command("file")
  .description("Show the diff of a single file")
  .argument("<path>", "File path relative to the repository root")
  .argument("[kind]", "What to diff: staged, unstaged, or all (vs HEAD)", parseKind)
  .option("-U, --context <lines>", "Unchanged lines around each hunk", parseContextLines)
  .option("--full", "Use the whole file as context", false)
  .option("--json", "Output results as JSON", false)
  .action(
    async (
      path: string,
      kindArg: DiffKind | undefined,
      options: Pick<DiffOptions, "context" | "full" | "json">
    ) => {
      try {
        const config = await loadConfig();
        const file = await getFileDiff(
          path,
          kindArg ?? config.kind,
          resolveContextLines(options, config)
        );

        if (options.json) {
          console.log(JSON.stringify(file, null, 2));
          return;
        }
        console.log(formatFileDiff(file));
      } catch (error) {
        exitWithError(error);
      }
    }
  );

program
  .command("parse")
  .description("Parse unified diff text from a file or stdin (no git needed)")
  .argument("[file]", "Diff file to read; reads stdin when omitted")
  .option("--stat", "Only list files with their change counts", false)
  .option("--patch", "Print the parsed files back as unified diff text", false)
  .option("--json", "Output results as JSON", false)
  .action(async (file: string | undefined, options: ParseOptions) => {
    try {
      if (!file && process.stdin.isTTY) {
        console.error(
          pc.red("Error: no diff given.\n") +
            pc.dim("Pass a file, or pipe one in:\n") +
            pc.dim("  git diff | hunkview parse")
        );
        process.exit(1);
      }

      const text = file ? await readTextFile(file) : await readStdin();
      const parsed = parseDiff(text);

      if (options.json) {
        console.log(JSON.stringify(parsed, null, 2));
        return;
      }
      if (options.patch) {
        process.stdout.write(formatDiff(parsed));
        return;
      }
      outputFiles(parsed.files, options.stat);
    } catch (error) {
      exitWithError(error);
    }
  });

// Register subcommands
program.addCommand(createStatusCommand());
program.addCommand(createShowCommand());

export async function run(): Promise<void> {
  await program.parseAsync();
}
