import { randomUUID } from "crypto";
import dotenv from "dotenv";
import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { join } from "path";
import { ConfigError } from "./errors.js";
import { latestTag } from "./git.js";
import type {
  ConfigSources,
  EnvironmentMode,
  LauncherConfig,
} from "./types.js";

export const DEFAULT_PORT = 5000;
export const DEFAULT_FILES_PORT = 5001;

const TRUE_VALUES = ["1", "true", "yes", "on"];
const FALSE_VALUES = ["0", "false", "no", "off"];

/**
 * Collaborators that produce values when the operator supplies none
 */
export interface ConfigDeps {
  latestTag: () => Promise<string>;
  generateSecret: () => string;
}

/**
 * Load and parse .env file with the same rules docker-compose applies
 */
export async function loadEnvFile(
  envPath: string
): Promise<Record<string, string>> {
  if (!existsSync(envPath)) {
    return {};
  }
  return dotenv.parse(await readFile(envPath, "utf8"));
}

/**
 * .env file in the directory the launcher is run from
 */
function findEnvFile(cwd: string): string {
  return join(cwd, ".env");
}

/**
 * Parse a boolean flag; unset falls back, anything unrecognised is an error
 */
export function parseBoolean(
  name: string,
  raw: string | undefined,
  fallback: boolean
): boolean {
  if (raw === undefined) {
    return fallback;
  }
  const value = raw.trim().toLowerCase();
  if (TRUE_VALUES.includes(value)) {
    return true;
  }
  if (FALSE_VALUES.includes(value)) {
    return false;
  }
  throw new ConfigError(
    "invalid-value",
    `${name} must be one of ${[...TRUE_VALUES, ...FALSE_VALUES].join(
      ", "
    )}, got "${raw}"`
  );
}

export function parsePort(
  name: string,
  raw: string | undefined,
  fallback: number
): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = raw.trim();
  const port = Number(value);
  if (!/^\d+$/.test(value) || port < 1 || port > 65535) {
    throw new ConfigError(
      "invalid-value",
      `${name} must be a port number between 1 and 65535, got "${raw}"`
    );
  }
  return port;
}

export function parseEnvironment(raw: string | undefined): EnvironmentMode {
  if (raw === undefined) {
    return "default";
  }
  const value = raw.trim().toLowerCase();
  if (value === "default" || value === "production") {
    return value;
  }
  throw new ConfigError(
    "invalid-value",
    `APP_ENV must be "default" or "production", got "${raw}"`
  );
}

/**
 * Look a key up through overrides, then the environment, then the .env file.
 * Blank values count as unset; others are returned as written.
 */
function layered(sources: ConfigSources): (name: string) => string | undefined {
  const layers = [
    sources.overrides ?? {},
    sources.env ?? {},
    sources.fileEnv ?? {},
  ];
  return (name) => {
    for (const layer of layers) {
      const value = layer[name];
      if (value !== undefined && value.trim() !== "") {
        return value;
      }
    }
    return undefined;
  };
}

/**
 * Build the launcher configuration from layered sources
 *
 * The tag lookup only runs when no IMAGE_TAG is supplied, and the secret
 * generator only when no SECRET_KEY is.
 */
export async function resolveConfig(
  sources: ConfigSources,
  deps: ConfigDeps
): Promise<LauncherConfig> {
  const get = layered(sources);

  const port = parsePort("PORT", get("PORT"), DEFAULT_PORT);
  const filesPort = parsePort("FILES_PORT", get("FILES_PORT"), DEFAULT_FILES_PORT);
  const environment = parseEnvironment(get("APP_ENV"));
  const devMode = parseBoolean("DEV_MODE", get("DEV_MODE"), false);
  if (devMode && environment === "production") {
    throw new ConfigError(
      "invalid-value",
      "DEV_MODE cannot be enabled with APP_ENV=production"
    );
  }

  const imageTag = (get("IMAGE_TAG") ?? (await deps.latestTag())).trim();
  if (!imageTag) {
    throw new ConfigError(
      "missing-image-tag",
      "No image tag found: set IMAGE_TAG or create a git tag"
    );
  }

  // Not trimmed: the container sees exactly the pinned value
  const secret = get("SECRET_KEY") ?? deps.generateSecret();
  if (!secret.trim()) {
    throw new ConfigError("invalid-value", "SECRET_KEY must not be empty");
  }

  return {
    port,
    filesPort,
    imageTag,
    environment,
    secret,
    sentryDsn: get("SENTRY_DSN"),
    devMode,
    containerName: get("CONTAINER_NAME")?.trim() ?? "app",
    execUser: get("EXEC_USER")?.trim(),
    execShell: get("EXEC_SHELL")?.trim() ?? "bash",
    baseComposeFile: get("BASE_COMPOSE_FILE")?.trim() ?? "docker-compose.yml",
    devComposeFile:
      get("DEV_COMPOSE_FILE")?.trim() ?? "docker-compose.local-dev.yml",
    composeBin: (get("COMPOSE_BIN") ?? "docker-compose").trim().split(/\s+/),
  };
}

/**
 * Load launcher configuration from .env file and environment variables
 * Environment variables take precedence over .env file values, explicit
 * overrides over both
 */
export async function loadLauncherConfig(
  overrides: Record<string, string | undefined> = {},
  cwd: string = process.cwd()
): Promise<LauncherConfig> {
  const fileEnv = await loadEnvFile(findEnvFile(cwd));

  return resolveConfig(
    { fileEnv, env: process.env, overrides },
    { latestTag: () => latestTag(cwd), generateSecret: () => randomUUID() }
  );
}

/**
 * Variables exported to the compose process for interpolation
 */
export function composeEnvironment(
  config: LauncherConfig
): Record<string, string> {
  const env: Record<string, string> = {
    PORT: String(config.port),
    FILES_PORT: String(config.filesPort),
    IMAGE_TAG: config.imageTag,
    APP_ENV: config.environment,
    SECRET_KEY: config.secret,
    DEV_MODE: config.devMode ? "1" : "0",
  };

  if (config.sentryDsn) {
    env.SENTRY_DSN = config.sentryDsn;
  }

  return env;
}
