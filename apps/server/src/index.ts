#!/usr/bin/env tsx

import { errorMessage } from "@apitools/core";
import { runCli } from "./cli.js";

try {
  process.exitCode = await runCli(process.argv.slice(2));
} catch (error) {
  console.error(`apitools: ${errorMessage(error)}`);
  process.exit(1);
}
