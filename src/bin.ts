#!/usr/bin/env node
import process from "node:process";

import { runCli } from "./cli";

const exitCode = await runCli(process.argv.slice(2), {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  env: process.env,
  cwd: process.cwd(),
});

process.exitCode = exitCode;
