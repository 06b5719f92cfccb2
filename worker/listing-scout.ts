#!/usr/bin/env node
import { createCli } from './cli.js';

createCli({ env: process.env })
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error('[CLI] Fatal error:', error);
    process.exitCode = 1;
  });
