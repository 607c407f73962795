import { spawn, type ChildProcess } from "child_process";
import { constants } from "os";
import { CommandError } from "./errors.js";
import type { ExecOptions, ExecResult } from "./types.js";

/**
 * Map a terminating signal to the shell convention of 128 + signal number
 */
function signalExitCode(signal: NodeJS.Signals | null): number {
  if (!signal) {
    return 1;
  }
  return 128 + constants.signals[signal];
}

/**
 * Render a command line for log and error messages
 */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args]
    .map((part) => (/[\s"']/.test(part) ? JSON.stringify(part) : part))
    .join(" ");
}

/**
 * Execute a local command
 *
 * Interactive commands inherit the terminal, so their output goes straight
 * to the operator and only the exit code is reported back.
 */
export function exec(
  command: string,
  args: string[] = [],
  options: ExecOptions = {}
): Promise<ExecResult> {
  return new Promise((resolve) => {
    let stdout = "";
    let stderr = "";
    let proc: ChildProcess;

    try {
      proc = spawn(command, args, {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        stdio: options.interactive ? "inherit" : ["ignore", "pipe", "pipe"],
      });
    } catch (error) {
      resolve({
        stdout: "",
        stderr: error instanceof Error ? error.message : String(error),
        exitCode: 127,
        success: false,
      });
      return;
    }

    proc.stdout?.on("data", (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    proc.stderr?.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    // Spawn failures (ENOENT, EACCES) report like a shell's "command not found"
    proc.once("error", (error: Error) => {
      resolve({
        stdout: "",
        stderr: error.message,
        exitCode: 127,
        success: false,
      });
    });

    proc.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
      const exitCode = code ?? signalExitCode(signal);
      resolve({
        stdout: stdout.trim(),
        stderr: stderr.trim(),
        exitCode,
        success: exitCode === 0,
      });
    });
  });
}

/**
 * Execute a command and return only stdout (throw on error)
 */
export async function execStdout(
  command: string,
  args: string[] = [],
  options: ExecOptions = {}
): Promise<string> {
  const result = await exec(command, args, { ...options, interactive: false });
  if (!result.success) {
    throw new CommandError(
      formatCommand(command, args),
      result.exitCode,
      result.stderr
    );
  }
  return result.stdout;
}
