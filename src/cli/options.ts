/**
 * Shared CLI helpers - argument parsers and error reporting
 */

import { InvalidArgumentError } from "commander";
import { type } from "arktype";
import pc from "picocolors";
import { ConfigError } from "../types/config.js";
import { DiffKindSchema, GitError, type DiffKind } from "../types/git.js";

/**
 * commander parser for a diff kind argument
 */
export function parseKind(value: string): DiffKind {
  const result = DiffKindSchema(value);
  if (result instanceof type.errors) {
    throw new InvalidArgumentError("Use staged, unstaged, or all.");
  }
  return result;
}

/**
 * commander parser for -U/--context
 */
export function parseContextLines(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Must be a non-negative integer.");
  }
  return parseInt(value, 10);
}

/**
 * Progress messages go to stderr when stdout carries JSON
 */
export function progress(message: string, json: boolean): void {
  if (json) {
    console.error(pc.dim(message));
  } else {
    console.log(pc.dim(message));
  }
}

/**
 * Print a friendly message for an error and exit
 */
export function exitWithError(error: unknown): never {
  if (error instanceof GitError) {
    console.error(pc.red(`Git error: ${error.message}`));
    if (error.code === "NOT_A_REPO") {
      console.error(pc.dim("Run this command from within a git repository."));
    } else if (error.code === "FILE_NOT_IN_DIFF") {
      console.error(pc.dim("Check the path, or try another diff kind (staged, unstaged, all)."));
    }
    process.exit(1);
  }

  if (error instanceof ConfigError) {
    console.error(pc.red(`Config error: ${error.message}`) + "\n" + pc.dim(`Source: ${error.source}`));
    process.exit(1);
  }

  // Unknown error
  const message = error instanceof Error ? error.message : String(error);
  console.error(pc.red(`Error: ${message}`));
  process.exit(1);
}
