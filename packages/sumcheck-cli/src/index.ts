#!/usr/bin/env node

/**
 * sumcheck: verify files against MD5 checksums.
 *
 * Usage:
 *   sumcheck file <file-path> <expected-checksum>
 *   sumcheck manifest <checksum-path>
 *
 * Exit status: 0 when everything matched, 1 on a mismatch, 2 on any error.
 */

import { createRequire } from 'node:module';
import { CommanderError } from 'commander';
import { EXIT_CODES, createLogger } from '@sumcheck/core';
import { createProgram } from './program.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const program = createProgram(
  {
    print: (line) => console.log(line),
    setStatus: (status) => {
      process.exitCode = EXIT_CODES[status];
    },
    createLogger,
  },
  pkg.version
);

program.parseAsync().catch((error: unknown) => {
  if (error instanceof CommanderError) {
    // --help and --version exit 0; usage errors count as errors
    process.exitCode = error.exitCode === 0 ? EXIT_CODES.ok : EXIT_CODES.error;
    return;
  }
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exitCode = EXIT_CODES.error;
});
