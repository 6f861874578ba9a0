#!/usr/bin/env node
import { describeError } from "@prtimeline/core";
import { runCli } from "./index.js";

runCli(process.argv.slice(2), process.cwd())
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`prtimeline: ${describeError(error)}`);
    process.exitCode = 1;
  });
