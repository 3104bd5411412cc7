#!/usr/bin/env node

import { buildProgram } from "./cli/program.js";
import { StoreUnavailableError } from "./ranking/errors.js";

// EX_TEMPFAIL: the caller may retry once the lock is released.
const STORE_UNAVAILABLE_EXIT_CODE = 75;

async function main(): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${message}`);
  process.exitCode = error instanceof StoreUnavailableError ? STORE_UNAVAILABLE_EXIT_CODE : 1;
});
