#!/usr/bin/env node
import "dotenv/config";
import { CommanderError } from "commander";
import { createRuntime } from "./bootstrap.js";
import { createProgram } from "./cli/program.js";
import { loadConfig } from "./config/env.js";

const program = createProgram({
  createRuntime: () => createRuntime(loadConfig()),
});

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof CommanderError) {
    process.exitCode = error.exitCode;
    return;
  }
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
