#!/usr/bin/env node

/**
 * config-roundtrip CLI entry point.
 */

/* eslint-disable no-console */
import { runCli } from './app.js';

try {
  process.exitCode = runCli(process.argv.slice(2)).exitCode;
} catch (error) {
  console.error('Unexpected error:', error instanceof Error ? error.message : String(error));
  if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exitCode = 1;
}
