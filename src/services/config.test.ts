import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { DEFAULT_CONFIG, loadConfig, readEnvConfig } from "./config.js";
import { CONFIG_FILE_NAME, ConfigError } from "../types/config.js";

let workDir: string;

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), "hunkview-config-"));
});

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true });
});

async function writeConfig(content: string): Promise<void> {
  await writeFile(join(workDir, CONFIG_FILE_NAME), content);
}

describe("loadConfig", () => {
  test("uses defaults when there is no config file or env", async () => {
    expect(await loadConfig(workDir, {})).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG).toEqual({ kind: "all", contextLines: 3, includeUntracked: true });
  });

  test("reads values from the config file", async () => {
    await writeConfig(JSON.stringify({ kind: "staged", contextLines: 10, includeUntracked: false }));

    expect(await loadConfig(workDir, {})).toEqual({
      kind: "staged",
      contextLines: 10,
      includeUntracked: false,
    });
  });

  test("env vars override the config file", async () => {
    await writeConfig(JSON.stringify({ kind: "staged", contextLines: 10 }));

    const config = await loadConfig(workDir, {
      HUNKVIEW_DIFF_KIND: "unstaged",
      HUNKVIEW_CONTEXT_LINES: "0",
    });

    expect(config).toEqual({ kind: "unstaged", contextLines: 0, includeUntracked: true });
  });

  test("rejects a config file with invalid values", async () => {
    await writeConfig(JSON.stringify({ kind: "everything", contextLines: -2 }));

    const error = await loadConfig(workDir, {}).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ source: join(workDir, CONFIG_FILE_NAME) });
  });

  test("rejects a config file that isn't JSON", async () => {
    await writeConfig("{ kind: staged");

    await expect(loadConfig(workDir, {})).rejects.toThrow(
      /^Could not parse hunkview\.config\.json: /
    );
  });
});

describe("readEnvConfig", () => {
  test("ignores unset and empty variables", () => {
    expect(readEnvConfig({ HUNKVIEW_DIFF_KIND: "" })).toEqual({});
  });

  test("rejects an unknown diff kind", () => {
    expect(() => readEnvConfig({ HUNKVIEW_DIFF_KIND: "cached" })).toThrow(
      'HUNKVIEW_DIFF_KIND must be staged, unstaged or all (got "cached")'
    );
  });

  test("rejects a non-numeric context count", () => {
    expect(() => readEnvConfig({ HUNKVIEW_CONTEXT_LINES: "lots" })).toThrow(ConfigError);
  });
});
