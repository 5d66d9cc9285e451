/**
 * Repository Commands - status listing and file content
 */

import { Command } from "commander";
import pc from "picocolors";
import { getFileContent, getStatus } from "../services/git.js";
import { exitWithError } from "./options.js";

export function createStatusCommand(): Command {
  return new Command("status")
    .description("List changed paths")
    .option("--json", "Output paths as a JSON array", false)
    .action(async (options: { json: boolean }) => {
      try {
        const paths = await getStatus();
        if (options.json) {
          console.log(JSON.stringify(paths, null, 2));
        } else if (paths.length === 0) {
          console.log(pc.yellow("Working tree clean."));
        } else {
          console.log(paths.join("\n"));
        }
      } catch (error) {
        exitWithError(error);
      }
    });
}

export function createShowCommand(): Command {
  return new Command("show")
    .description("Print a file as of HEAD, or from disk if it isn't committed")
    .argument("<path>", "File path relative to the repository root")
    .action(async (path: string) => {
      try {
        process.stdout.write(await getFileContent(path));
      } catch (error) {
        exitWithError(error);
      }
    });
}
