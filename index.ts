#!/usr/bin/env node

/**
 * CLI entry point: starts the container stack, forwarding every argument
 * to `docker-compose up`
 */
import { run } from "./src/cli.js";

run(process.argv.slice(2))
  .then((code) => {
    process.exit(code);
  })
  .catch((error) => {
    console.error(
      `CLI failed: ${error instanceof Error ? error.message : String(error)}`
    );
    process.exit(1);
  });
