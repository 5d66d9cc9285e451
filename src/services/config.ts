import { join } from "node:path";
import { type } from "arktype";
import { fileExists, readTextFile } from "../runtime/index.js";
import { DEFAULT_CONTEXT_LINES, DiffKindSchema } from "../types/git.js";
import {
  CONFIG_FILE_NAME,
  ConfigError,
  ConfigFileSchema,
  type ConfigFile,
  type ResolvedConfig,
} from "../types/config.js";

export const DEFAULT_CONFIG: ResolvedConfig = {
  kind: "all",
  contextLines: DEFAULT_CONTEXT_LINES,
  includeUntracked: true,
};

/**
 * Read and validate hunkview.config.json, if there is one
 */
async function readConfigFile(cwd: string): Promise<ConfigFile> {
  const path = join(cwd, CONFIG_FILE_NAME);
  if (!(await fileExists(path))) {
    return {};
  }

  let data: unknown;
  try {
    data = JSON.parse(await readTextFile(path));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Could not parse ${CONFIG_FILE_NAME}: ${message}`, path);
  }

  const result = ConfigFileSchema(data);
  if (result instanceof type.errors) {
    throw new ConfigError(`Invalid ${CONFIG_FILE_NAME}: ${result.summary}`, path);
  }
  return result;
}

/**
 * Pick up HUNKVIEW_DIFF_KIND and HUNKVIEW_CONTEXT_LINES
 */
export function readEnvConfig(env: NodeJS.ProcessEnv): ConfigFile {
  const config: ConfigFile = {};

  const kind = env["HUNKVIEW_DIFF_KIND"];
  if (kind) {
    const result = DiffKindSchema(kind);
    if (result instanceof type.errors) {
      throw new ConfigError(
        `HUNKVIEW_DIFF_KIND must be staged, unstaged or all (got "${kind}")`,
        "HUNKVIEW_DIFF_KIND"
      );
    }
    config.kind = result;
  }

  const contextLines = env["HUNKVIEW_CONTEXT_LINES"];
  if (contextLines) {
    if (!/^\d+$/.test(contextLines)) {
      throw new ConfigError(
        `HUNKVIEW_CONTEXT_LINES must be a non-negative integer (got "${contextLines}")`,
        "HUNKVIEW_CONTEXT_LINES"
      );
    }
    config.contextLines = parseInt(contextLines, 10);
  }

  return config;
}

/**
 * Resolve the effective config: defaults, then the config file, then env vars.
 * CLI flags are applied on top of this by the commands themselves.
 */
export async function loadConfig(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): Promise<ResolvedConfig> {
  const fromFile = await readConfigFile(cwd);
  const fromEnv = readEnvConfig(env);

  return {
    kind: fromEnv.kind ?? fromFile.kind ?? DEFAULT_CONFIG.kind,
    contextLines: fromEnv.contextLines ?? fromFile.contextLines ?? DEFAULT_CONFIG.contextLines,
    includeUntracked: fromFile.includeUntracked ?? DEFAULT_CONFIG.includeUntracked,
  };
}
