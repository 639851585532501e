#!/usr/bin/env tsx
/**
 * loadramp CLI
 *
 * Load-ramp experiments against a scrape collector or a Pushgateway.
 * @module @loadramp/cli
 */

import { isLoadRampError, isValidationError } from '@loadramp/shared';
import { createProgram } from './program.js';
import { error } from './output.js';

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (isValidationError(err)) {
      error(err.message, err.details);
      process.exit(err.exitCode);
    }
    if (isLoadRampError(err)) {
      error(err.message);
      process.exit(err.exitCode);
    }
    error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
