#!/usr/bin/env node
/**
 * qarnot-mcp CLI entry point
 */

import { config as loadDotenv } from 'dotenv';
import { createProgram } from './program.js';

loadDotenv();

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
