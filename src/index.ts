#!/usr/bin/env node
// CHANGE: Delegate execution to modular CLI runner.
// WHY: Importing the CLI helpers must not trigger command parsing.

import { realpathSync } from "fs";
import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

const executedDirectly = process.argv[1]
  ? pathToFileURL(realpathSync(process.argv[1])).href === import.meta.url
  : false;

if (executedDirectly) {
  await runCli(process.argv);
}

export { runCli };
