/**
 * Config Types - shape of hunkview.config.json
 *
 * Same ArkType approach as the other schemas: one runtime validator,
 * with the TypeScript type inferred from it.
 */

import { type } from "arktype";
import { DiffKindSchema, type DiffKind } from "./git.js";

/** File looked up in the working directory */
export const CONFIG_FILE_NAME = "hunkview.config.json";

export const ConfigFileSchema = type({
  /** Default diff kind when the CLI isn't given one */
  "kind?": DiffKindSchema,
  /** Default number of context lines around each hunk */
  "contextLines?": "number.integer >= 0",
  /** Whether "unstaged" and "all" diffs include untracked files */
  "includeUntracked?": "boolean",
});

export type ConfigFile = typeof ConfigFileSchema.infer;

/** Config after defaults, file and environment have been merged */
export interface ResolvedConfig {
  kind: DiffKind;
  contextLines: number;
  includeUntracked: boolean;
}

/**
 * Error thrown when the config file or an env override is invalid.
 */
export class ConfigError extends Error {
  constructor(message: string, public readonly source: string) {
    super(message);
    this.name = "ConfigError";
  }
}
