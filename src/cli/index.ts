#!/usr/bin/env node
import { createProgram } from "./program.js";
import { runCommand } from "./run.js";

const program = createProgram(async (options) => {
  process.exitCode = await runCommand(options, { env: process.env });
});

await program.parseAsync();
