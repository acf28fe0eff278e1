#!/usr/bin/env node
import { buildProgram } from '../src/cost-reporter/cli';

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
