#!/usr/bin/env node
import process from 'node:process';

import { EXIT_INTERNAL_ERROR, main } from './program.ts';

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = EXIT_INTERNAL_ERROR;
  },
);
