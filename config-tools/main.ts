#!/usr/bin/env node

import { CommanderError } from "commander";
import { createProgram, exitCodeFor } from "./cli.js";

try {
  await createProgram().parseAsync(process.argv);
} catch (error) {
  // Commander has already printed its own usage and help messages.
  if (!(error instanceof CommanderError)) {
    console.error("\n❌ Process failed:", error);
  }
  process.exit(exitCodeFor(error));
}
