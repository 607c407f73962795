import { launchStack } from "./commands/launch.js";
import { DockerComposeCli } from "./lib/compose.js";
import { composeEnvironment, loadLauncherConfig } from "./lib/config.js";
import { LauncherError } from "./lib/errors.js";
import { log } from "./lib/logger.js";
import type { ComposeRunner, LauncherConfig } from "./lib/types.js";

export interface RunDeps {
  cwd?: string;
  loadConfig?: (cwd: string) => Promise<LauncherConfig>;
  createRunner?: (config: LauncherConfig, cwd: string) => ComposeRunner;
}

function defaultRunner(config: LauncherConfig, cwd: string): ComposeRunner {
  return new DockerComposeCli({
    bin: config.composeBin,
    env: composeEnvironment(config),
    cwd,
  });
}

/**
 * Start the stack with every argument forwarded to `up`; resolves to the
 * process exit code
 */
export async function run(argv: string[], deps: RunDeps = {}): Promise<number> {
  const cwd = deps.cwd ?? process.cwd();
  const loadConfig = deps.loadConfig ?? ((dir) => loadLauncherConfig({}, dir));
  const createRunner = deps.createRunner ?? defaultRunner;

  try {
    const config = await loadConfig(cwd);
    return await launchStack(config, createRunner(config, cwd), argv, { cwd });
  } catch (error) {
    if (error instanceof LauncherError) {
      log.error(error.message);
      return error.exitCode;
    }
    log.error(
      `Launcher failed: ${error instanceof Error ? error.message : String(error)}`
    );
    if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    return 1;
  }
}
