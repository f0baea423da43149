#!/usr/bin/env node
// src/bin.ts

import { main } from './cli.js';

main(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exit(1);
  }
);
