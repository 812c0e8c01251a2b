#!/usr/bin/env node
import { runLint } from './cli/lint.js';

runLint(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 70;
  });
