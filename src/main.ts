#!/usr/bin/env node
import { main } from "./cli";

// stdout carries the JSON result only; diagnostics go to stderr
globalThis.console = new console.Console({ stdout: process.stderr, stderr: process.stderr });

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error("ops-health crashed", {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exitCode = 1;
  });
