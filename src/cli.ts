#!/usr/bin/env node
import { runCli } from './cli-runner';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('Error running obj2ia:', error);
    process.exitCode = 1;
  });
