#!/usr/bin/env node
import { createCli } from "./cli/program.js";

createCli()
  .runExit(process.argv.slice(2))
  .catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
