#!/usr/bin/env node
// src/bin.ts
import { hideBin } from 'yargs/helpers';

import { runCli } from './cli';

runCli(hideBin(process.argv)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  }
);
