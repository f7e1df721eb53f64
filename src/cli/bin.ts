#!/usr/bin/env node
import { reportUnexpectedError, runCli } from './test-sorted.js';

runCli(process.argv.slice(2), {
  stdout: process.stdout,
  stderr: process.stderr,
  cwd: process.cwd(),
}).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    process.exitCode = reportUnexpectedError(error, process.stderr);
  },
);
