#!/usr/bin/env node

import { runCLI } from "./cli.js";

runCLI().catch(() => {
  // runCLI has already reported the error
  process.exitCode = 1;
});
