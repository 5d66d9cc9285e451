#!/usr/bin/env node
/**
 * Entry point for the hunkview CLI
 *
 * We explicitly load .env from the package directory (not cwd) so that
 * HUNKVIEW_* defaults apply no matter where the tool is run from.
 */
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { fileExists, readTextFile } from "./runtime/index.js";
import { run } from "./cli/index.js";

// src/ when run from source, dist/ once built; either way .env sits one level up
const scriptDir = dirname(fileURLToPath(import.meta.url));
const envPath = join(scriptDir, "..", ".env");

if (await fileExists(envPath)) {
  const envContent = await readTextFile(envPath);
  for (const line of envContent.split("\n")) {
    const trimmed = line.trim();
    // Skip comments and empty lines
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIndex = trimmed.indexOf("=");
    if (eqIndex === -1) continue;
    const key = trimmed.slice(0, eqIndex).trim();
    const value = trimmed.slice(eqIndex + 1).trim();
    // Only set if not already set (existing env vars take precedence)
    if (!(key in process.env)) {
      process.env[key] = value;
    }
  }
}

await run();
