import { existsSync } from "fs";
import { readFile } from "fs/promises";
import yaml from "yaml";
import { ConfigError } from "./errors.js";
import { exec, formatCommand } from "./exec.js";
import { log } from "./logger.js";
import type {
  AttachOptions,
  ComposeRunner,
  DockerComposeConfig,
  EnvironmentMode,
} from "./types.js";

/**
 * Compose files for a run: the base file, plus the local-dev override in dev
 * mode. Production always runs the base file alone.
 */
export function selectComposeFiles(
  devMode: boolean,
  environment: EnvironmentMode,
  baseFile: string,
  devFile: string
): string[] {
  if (environment === "production" || !devMode) {
    return [baseFile];
  }
  return [baseFile, devFile];
}

function fileArgs(files: string[]): string[] {
  return files.flatMap((file) => ["-f", file]);
}

/**
 * Compose invocation as the operator would type it, for hints
 */
export function composeCommandLine(bin: string[], files: string[]): string {
  return [...bin, ...fileArgs(files)].join(" ");
}

export interface DockerComposeCliOptions {
  /** Compose executable, e.g. ["docker-compose"] or ["docker", "compose"] */
  bin: string[];
  /** Variables merged over process.env for every invocation */
  env: Record<string, string>;
  cwd?: string;
  /** Container runtime CLI used for exec */
  docker?: string;
}

/**
 * ComposeRunner backed by the docker-compose and docker CLIs
 */
export class DockerComposeCli implements ComposeRunner {
  constructor(private readonly options: DockerComposeCliOptions) {}

  async start(files: string[], args: string[]): Promise<number> {
    return this.compose([...fileArgs(files), "up", "-d", ...args]);
  }

  async attach(name: string, options: AttachOptions): Promise<number> {
    const args = ["exec", "-it"];
    if (options.user) {
      args.push("-u", options.user);
    }
    args.push(name, options.shell);
    return this.run(this.options.docker ?? "docker", args);
  }

  async stop(files: string[], options: { volumes: boolean }): Promise<number> {
    const args = [...fileArgs(files), "down"];
    if (options.volumes) {
      args.push("--volumes");
    }
    return this.compose(args);
  }

  private compose(args: string[]): Promise<number> {
    const [command = "docker-compose", ...prefix] = this.options.bin;
    return this.run(command, [...prefix, ...args]);
  }

  private async run(command: string, args: string[]): Promise<number> {
    log.info(`Running: ${formatCommand(command, args)}`);
    const result = await exec(command, args, {
      cwd: this.options.cwd,
      env: this.options.env,
      interactive: true,
    });
    // Output already went to the terminal; only spawn failures land here
    if (result.stderr) {
      log.error(result.stderr);
    }
    return result.exitCode;
  }
}

function isComposeConfig(value: unknown): value is DockerComposeConfig {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const services: unknown = Reflect.get(value, "services");
  return (
    services === undefined ||
    services === null ||
    (typeof services === "object" && !Array.isArray(services))
  );
}

/**
 * Read and parse a compose file, failing before the orchestration tool runs
 */
export async function readComposeFile(
  path: string
): Promise<DockerComposeConfig> {
  if (!existsSync(path)) {
    throw new ConfigError("compose-file", `Compose file not found: ${path}`);
  }

  const content = await readFile(path, "utf8");
  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (error) {
    throw new ConfigError(
      "compose-file",
      `Failed to parse ${path}: ${
        error instanceof Error ? error.message : String(error)
      }`
    );
  }

  if (!isComposeConfig(parsed)) {
    throw new ConfigError(
      "compose-file",
      `Invalid compose file structure: ${path}`
    );
  }

  return parsed;
}

/**
 * Container names declared across compose files; a service without
 * container_name is listed under its service key
 */
export function declaredContainerNames(
  documents: DockerComposeConfig[]
): string[] {
  const names = new Set<string>();
  for (const document of documents) {
    for (const [key, service] of Object.entries(document.services ?? {})) {
      names.add(service?.container_name ?? key);
    }
  }
  return [...names];
}
