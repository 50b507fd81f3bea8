#!/usr/bin/env node

import { runCommand, USAGE } from './commands.js';
import { UsageError, describeError } from './errors.js';

async function main(): Promise<void> {
  process.exitCode = await runCommand(process.argv.slice(2));
}

main().catch((error: unknown) => {
  console.error(describeError(error));
  if (error instanceof UsageError) {
    console.error(USAGE);
  }
  process.exitCode = 1;
});
