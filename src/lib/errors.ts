/**
 * Base class for failures the CLI reports with a specific exit code
 */
export class LauncherError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = "LauncherError";
    this.exitCode = exitCode;
  }
}

export type ConfigErrorKind =
  | "missing-image-tag"
  | "invalid-value"
  | "compose-file";

/**
 * Configuration could not be resolved; raised before any compose call
 */
export class ConfigError extends LauncherError {
  readonly kind: ConfigErrorKind;

  constructor(kind: ConfigErrorKind, message: string) {
    super(message, 1);
    this.name = "ConfigError";
    this.kind = kind;
  }
}

/**
 * An external command exited non-zero
 */
export class CommandError extends LauncherError {
  readonly command: string;
  readonly stderr: string;

  constructor(command: string, exitCode: number, stderr: string) {
    super(
      `Command failed (exit ${exitCode}): ${command}${
        stderr ? `: ${stderr}` : ""
      }`,
      exitCode
    );
    this.name = "CommandError";
    this.command = command;
    this.stderr = stderr;
  }
}
