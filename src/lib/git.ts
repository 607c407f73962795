import { CommandError } from "./errors.js";
import { execStdout } from "./exec.js";
import { log } from "./logger.js";

/**
 * Latest git tag in version order, or "" when none can be found
 */
export async function latestTag(cwd?: string): Promise<string> {
  let output: string;
  try {
    output = await execStdout(
      "git",
      ["tag", "--list", "--sort=version:refname"],
      { cwd }
    );
  } catch (error) {
    if (!(error instanceof CommandError)) {
      throw error;
    }
    log.warn(`Could not list git tags: ${error.stderr || error.message}`);
    return "";
  }

  const tags = output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line);

  return tags[tags.length - 1] ?? "";
}
