import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { run } from "./cli.js";
import { resolveConfig } from "./lib/config.js";
import { ConfigError, LauncherError } from "./lib/errors.js";
import type { ComposeRunner, LauncherConfig } from "./lib/types.js";

function recordingRunner(startCode = 0) {
  const start = vi.fn(async (_files: string[], _args: string[]) => startCode);
  const runner: ComposeRunner = {
    start,
    attach: vi.fn(async () => 0),
    stop: vi.fn(async () => 0),
  };
  return { runner, start };
}

function testConfig(): Promise<LauncherConfig> {
  return resolveConfig(
    { env: { IMAGE_TAG: "v1.2.0", SECRET_KEY: "test-secret" } },
    { latestTag: async () => "", generateSecret: () => "unused" }
  );
}

describe("run", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "stack-launcher-cli-"));
    await writeFile(
      join(dir, "docker-compose.yml"),
      "services:\n  web:\n    container_name: app\n"
    );
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("forwards argv to up verbatim and exits 0", async () => {
    const { runner, start } = recordingRunner();
    const config = await testConfig();

    const code = await run(["--build", "--scale", "web=2"], {
      cwd: dir,
      loadConfig: async () => config,
      createRunner: () => runner,
    });

    expect(code).toBe(0);
    expect(start).toHaveBeenCalledWith(
      ["docker-compose.yml"],
      ["--build", "--scale", "web=2"]
    );
  });

  it("loads config from the working directory and hands it to the runner", async () => {
    const { runner } = recordingRunner();
    const config = await testConfig();
    const loadConfig = vi.fn(async (_cwd: string) => config);
    const createRunner = vi.fn(
      (_config: LauncherConfig, _cwd: string) => runner
    );

    await run([], { cwd: dir, loadConfig, createRunner });

    expect(loadConfig).toHaveBeenCalledWith(dir);
    expect(createRunner).toHaveBeenCalledWith(config, dir);
  });

  it("exits with the up exit code", async () => {
    const { runner } = recordingRunner(5);
    const config = await testConfig();

    const code = await run([], {
      cwd: dir,
      loadConfig: async () => config,
      createRunner: () => runner,
    });

    expect(code).toBe(5);
  });

  it("logs a configuration error and exits 1", async () => {
    const { runner, start } = recordingRunner();

    const code = await run([], {
      cwd: dir,
      loadConfig: async () => {
        throw new ConfigError(
          "missing-image-tag",
          "No image tag found: set IMAGE_TAG or create a git tag"
        );
      },
      createRunner: () => runner,
    });

    expect(code).toBe(1);
    expect(start).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith(
      expect.anything(),
      "No image tag found: set IMAGE_TAG or create a git tag"
    );
  });

  it("exits with the exit code a LauncherError carries", async () => {
    const code = await run([], {
      cwd: dir,
      loadConfig: async () => {
        throw new LauncherError("docker is unavailable", 4);
      },
    });

    expect(code).toBe(4);
  });

  it("reports unexpected errors as launcher failures with exit 1", async () => {
    const code = await run([], {
      cwd: dir,
      loadConfig: async () => {
        throw new Error("boom");
      },
    });

    expect(code).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      expect.anything(),
      "Launcher failed: boom"
    );
  });
});
