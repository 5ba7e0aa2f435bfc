#!/usr/bin/env node
import { runCli } from "./cli/program.js";
import { log } from "./utils/logger.js";

runCli(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    log.fatal({ err: error }, "Unhandled failure");
    process.exitCode = 1;
  });
