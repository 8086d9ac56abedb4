#!/usr/bin/env node
/**
 * mijnbib command line entry
 *
 * Usage:
 *   mijnbib loans 123456 --verbose
 */

import { main } from '../cli.js';
import { loadEnv } from '../config.js';

loadEnv();

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('💥 Fatal error:', error);
    process.exit(1);
  });
