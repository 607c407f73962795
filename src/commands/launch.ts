import { resolve } from "path";
import {
  composeCommandLine,
  declaredContainerNames,
  readComposeFile,
  selectComposeFiles,
} from "../lib/compose.js";
import { log } from "../lib/logger.js";
import type { ComposeRunner, LauncherConfig } from "../lib/types.js";

export interface LaunchOptions {
  /** Directory compose file paths are resolved against */
  cwd?: string;
}

/**
 * Print the dev-mode usage banner
 */
export function printBanner(config: LauncherConfig): void {
  log.separator();
  log.raw(`Local development stack is up.

  App:          http://localhost:${config.port}
  Static files: http://localhost:${config.filesPort}

  - Source is mounted into '${config.containerName}'; restart the app process to pick up changes
  - Logs from other services: docker-compose logs -f
  - Leaving this shell (exit or Ctrl-D) stops the stack and REMOVES its volumes`);
  log.separator();
  log.blank();
}

/**
 * Bring the stack up and, in dev mode, attach a shell and tear down on exit
 *
 * Returns the exit code of the first failing step, or 0.
 */
export async function launchStack(
  config: LauncherConfig,
  runner: ComposeRunner,
  args: string[],
  options: LaunchOptions = {}
): Promise<number> {
  const cwd = options.cwd ?? process.cwd();
  const files = selectComposeFiles(
    config.devMode,
    config.environment,
    config.baseComposeFile,
    config.devComposeFile
  );

  const documents = await Promise.all(
    files.map((file) => readComposeFile(resolve(cwd, file)))
  );

  log.info(
    `Image tag ${config.imageTag}, ports ${config.port}/${config.filesPort}, ` +
      `environment ${config.environment}${config.devMode ? " (dev mode)" : ""}`
  );

  const upCode = await runner.start(files, args);
  if (upCode !== 0) {
    log.error(`Failed to start stack (exit ${upCode})`);
    return upCode;
  }

  if (!config.devMode) {
    log.ok("Stack started");
    return 0;
  }

  if (!declaredContainerNames(documents).includes(config.containerName)) {
    log.warn(
      `Container '${config.containerName}' is not declared in ${files.join(", ")}`
    );
  }

  printBanner(config);

  const attachCode = await runner.attach(config.containerName, {
    user: config.execUser,
    shell: config.execShell,
  });
  if (attachCode !== 0) {
    log.error(
      `Session in '${config.containerName}' ended with exit ${attachCode}; the stack is still running`
    );
    log.info(
      `Clean up with: ${composeCommandLine(
        config.composeBin,
        files
      )} down --volumes`
    );
    return attachCode;
  }

  log.info("Session ended, stopping stack and removing volumes");
  const downCode = await runner.stop(files, { volumes: true });
  if (downCode !== 0) {
    log.error(`Failed to stop stack (exit ${downCode})`);
    return downCode;
  }

  log.ok("Stack stopped");
  return 0;
}
