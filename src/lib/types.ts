/**
 * Environment mode forwarded to the stack as APP_ENV
 */
export type EnvironmentMode = "default" | "production";

/**
 * Launcher configuration, resolved once at startup
 */
export interface LauncherConfig {
  port: number;
  filesPort: number;
  imageTag: string;
  environment: EnvironmentMode;
  secret: string;
  sentryDsn?: string;
  devMode: boolean;
  containerName: string;
  execUser?: string;
  execShell: string;
  baseComposeFile: string;
  devComposeFile: string;
  composeBin: string[];
}

/**
 * Raw key/value sources layered into a LauncherConfig
 */
export interface ConfigSources {
  fileEnv?: Record<string, string>;
  env?: Record<string, string | undefined>;
  overrides?: Record<string, string | undefined>;
}

/**
 * Process execution options
 */
export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string | undefined>;
  interactive?: boolean;
}

/**
 * Process execution result
 */
export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  success: boolean;
}

/**
 * Options for attaching a shell to a running container
 */
export interface AttachOptions {
  user?: string;
  shell: string;
}

/**
 * Narrow view of the orchestration tool used by the launcher
 */
export interface ComposeRunner {
  start(files: string[], args: string[]): Promise<number>;
  attach(name: string, options: AttachOptions): Promise<number>;
  stop(files: string[], options: { volumes: boolean }): Promise<number>;
}

/**
 * The parts of a compose file the launcher reads
 */
export interface DockerComposeConfig {
  services?: Record<string, DockerComposeService | null>;
}

export interface DockerComposeService {
  container_name?: string;
}
