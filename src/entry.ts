#!/usr/bin/env node
import { runCli } from "./cli/program.js";
import { errorMessage } from "./pipeline/errors.js";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err) => {
    console.error(`gridrun: ${errorMessage(err)}`);
    process.exitCode = 1;
  },
);
